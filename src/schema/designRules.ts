/**
 * Custom design rules (.kicad_dru)
 *
 * Unlike the other file kinds a rules file is a sequence of top-level lists:
 * one (version N) followed by (rule ...) forms.
 */

import type { LibraryConfig } from '../shared/config';
import { atomFromText, isList, list, str, sym, type SExprDocument, type SExprList } from '../parser/sexpr';
import { Condition } from '../rules/conditionParser';
import { defineCodec, type Entity } from './codec';
import { optionalString } from './common';

// --- Types ---

export interface ConstraintLimits {
  min?: string;
  opt?: string;
  max?: string;
}

export interface RuleConstraint extends Entity, ConstraintLimits {
  /** clearance, track_width, via_diameter, disallow, ... */
  constraintType: string;
  /** Bare arguments such as the item types of `disallow` */
  args: string[];
}

export interface DesignRule extends Entity {
  name: string;
  constraints: RuleConstraint[];
  condition?: Condition;
  /** outer, inner or a layer name */
  layer?: string;
  /** error, warning, ignore or exclusion */
  severity?: string;
}

export interface DesignRules extends Entity {
  version: number;
  rules: DesignRule[];
}

/** Keyword of the synthetic list that holds a rules file's top-level forms while decoding */
const DOCUMENT_KEYWORD = 'design_rules';

// --- Codecs ---

function limit(name: keyof ConstraintLimits, value: string | undefined): SExprList | undefined {
  return value === undefined ? undefined : list(name, atomFromText(value));
}

export const constraintCodec = defineCodec<RuleConstraint>({
  keyword: 'constraint',
  read(reader) {
    const constraint: RuleConstraint = {
      constraintType: reader.string(1, 'type'),
      min: reader.childString('min'),
      opt: reader.childString('opt'),
      max: reader.childString('max'),
      args: [],
      extras: [],
    };
    constraint.args = reader.atomsFrom(2);
    return constraint;
  },
  plan: [
    { field: 'type', emit: (c) => sym(c.constraintType) },
    { field: 'args', emit: (c) => c.args.map(atomFromText) },
    { field: 'min', emit: (c) => limit('min', c.min) },
    { field: 'opt', emit: (c) => limit('opt', c.opt) },
    { field: 'max', emit: (c) => limit('max', c.max) },
  ],
  create: () => ({ constraintType: 'clearance', args: [], extras: [] }),
});

export const ruleCodec = defineCodec<DesignRule>({
  keyword: 'rule',
  read(reader) {
    const condition = reader.childString('condition');
    return {
      name: reader.string(1, 'name'),
      layer: reader.childString('layer'),
      severity: reader.childString('severity'),
      constraints: reader.decodeChildren('constraint', constraintCodec.decode),
      condition: condition !== undefined ? new Condition(condition) : undefined,
      extras: [],
    };
  },
  plan: [
    { field: 'name', emit: (r) => str(r.name) },
    { field: 'layer', when: (r) => r.layer !== undefined, emit: (r) => list('layer', r.layer ?? '') },
    { field: 'severity', when: (r) => r.severity !== undefined, emit: (r) => list('severity', r.severity ?? '') },
    { field: 'constraint', emit: (r) => r.constraints.map(constraintCodec.encode) },
    { field: 'condition', emit: (r) => optionalString('condition', r.condition?.text) },
  ],
  create: () => ({ name: '', constraints: [], extras: [] }),
});

const rulesFileCodec = defineCodec<DesignRules>({
  keyword: DOCUMENT_KEYWORD,
  read(reader) {
    return {
      version: reader.childInteger('version') ?? 1,
      rules: reader.decodeChildren('rule', ruleCodec.decode),
      extras: [],
    };
  },
  plan: [
    { field: 'version', emit: (d) => list('version', d.version) },
    { field: 'rule', emit: (d) => d.rules.map(ruleCodec.encode) },
  ],
  create: (config: LibraryConfig) => ({ version: config.versions['design-rules'], rules: [], extras: [] }),
});

// --- Document ---

export function decodeDesignRules(doc: SExprDocument): DesignRules {
  return rulesFileCodec.decode({ kind: 'list', items: [sym(DOCUMENT_KEYWORD), ...doc.forms] });
}

export function encodeDesignRules(rules: DesignRules): SExprDocument {
  const node = rulesFileCodec.encode(rules);
  return { forms: node.items.slice(1).filter(isList) };
}

export function createDesignRules(config?: LibraryConfig): DesignRules {
  return rulesFileCodec.create(config);
}
