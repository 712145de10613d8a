export {
  defineCodec, encodeWithPlan, restoreOrder, restoreNested, placeExtras, emitBool, readBool, yesNo, optionalYesNo,
  isRawItem, rawItem, CodecRegistry,
} from './codec';
export type { Entity, TaggedEntity, RawItem, EmitStep, SchemaCodec, CodecDefinition } from './codec';
export {
  readPoint, point, readPosition, position, readPoints, points, readHeader, headerSteps, readIdentifier, newUuid,
  identifier, readColor, optionalColor, optionalPosition, color, strokeCodec, fontCodec, effectsCodec, pageSettingsCodec, titleBlockCodec,
  propertyCodec, netCodec, optionalString, optionalNumber,
} from './common';
export type {
  Point, Position, FileHeader, Identifier, Color, Stroke, Font, Effects, PageSettings, TitleBlockComment, TitleBlock,
  Property, Net,
} from './common';
export {
  createShapeCodecs, boardShapes, footprintShapes, shapeRegistry, isGraphicKeyword, isShape, readTextLayer, textLayer,
  boardTextBoxCodec, footprintTextBoxCodec,
} from './graphics';
export type { ShapeKind, ShapePrefix, GraphicShape, TextBox } from './graphics';
export { padCodec, fpTextCodec, modelCodec, footprintGraphics, footprintCodec } from './footprint';
export type { PadDrill, PadOptions, PcbPad, FpText, XYZ, FootprintModel, FootprintGraphic, PcbFootprint } from './footprint';
export { segmentCodec, arcCodec, viaCodec, trackRegistry, boardGraphicRegistry, groupCodec, boardCodec } from './board';
export type { PcbLayer, PcbSegment, PcbArc, PcbVia, PcbTrack, PcbGroup, BoardGraphic, PcbBoard } from './board';
export {
  boardTextCodec, dimensionFormatCodec, dimensionStyleCodec, dimensionCodec, targetCodec, zoneFillCodec,
  filledPolygonCodec, zoneCodec, boardGeneralCodec, boardSetupCodec,
} from './boardItems';
export type {
  BoardText, DimensionFormat, DimensionStyle, PcbDimension, PcbTarget, ZoneFill, FilledPolygon, KeepoutRule, PcbZone,
  BoardGeneral, BoardSetup,
} from './boardItems';
export { pinCodec, symbolUnitCodec, pinNamesCodec, pinNumbersCodec, libSymbolCodec, symbolLibraryCodec } from './symbolLib';
export type { PinAlternate, SymbolPin, UnitItem, SymbolUnit, PinNames, PinNumbers, LibSymbol, SymbolLibrary } from './symbolLib';
export {
  junctionCodec, noConnectCodec, wireSegmentCodec, busCodec, localLabelCodec, globalLabelCodec, hierarchicalLabelCodec,
  schematicSymbolCodec, schematicItems, schematicCodec,
} from './schematic';
export type { Junction, NoConnect, Wire, Label, SymbolPinRef, SchematicSymbol, SchematicItem, KicadSchematic } from './schematic';
export {
  readFill, fillList, readInstancePath, instancePathList, readProjectInstances, instancesList, schematicTextCodec,
  schematicTextBoxCodec, busEntryCodec, polylineCodec, sheetPinCodec, sheetCodec,
} from './schematicItems';
export type {
  Fill, Size, InstancePath, ProjectInstance, SchematicText, SchematicTextBox, BusEntry, Polyline, SheetPin, Sheet,
} from './schematicItems';
export { wksSetupCodec, wksLineCodec, wksRectCodec, wksTextCodec, worksheetItems, worksheetCodec } from './worksheet';
export type { WksPoint, WksSetup, WksShape, WksText, WksItem, Worksheet } from './worksheet';
export { constraintCodec, ruleCodec, decodeDesignRules, encodeDesignRules, createDesignRules } from './designRules';
export type { ConstraintLimits, RuleConstraint, DesignRule, DesignRules } from './designRules';
export { libraryEntryCodec, footprintLibTableCodec, symbolLibTableCodec } from './libTable';
export type { LibraryEntry, LibraryTable } from './libTable';
