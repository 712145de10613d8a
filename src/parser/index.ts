export {
  parseSExpression, parseSingle, tokenize, bareword, atomFromText, sexprEqual, atomsEqual,
  sym, flag, str, num, list, toExpr, isList, isAtom, isNumberAtom,
} from './sexpr';
export type { SExpr, SExprAtom, SExprList, SExprDocument, SymbolAtom, StringAtom, NumberAtom, ListLayout, Token, ParseOptions } from './sexpr';
export {
  atomText, keywordOf, keyOf, describe, findExpr, findAllExpr, getAtom, getStringValue, getNumberValue,
  getXY, getSize, hasFlag, getBoolValue, asString, asNumber, asInteger, NodeReader,
} from './nodeAccessor';
export type { ExtraItem, NestedExtras, FlagForm, BoolToken } from './nodeAccessor';
export { serializeSExpression, formatList, formatAtom, formatNumber, quoteString } from './formatter';
export type { SerializeOptions } from './formatter';
export { carryLayout, carryDocumentLayout } from './layout';
