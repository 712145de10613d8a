import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { constraintCodec, createDesignRules, decodeDesignRules, encodeDesignRules, ruleCodec } from '../../../src/schema/designRules';
import { Condition, parseCondition } from '../../../src/rules/conditionParser';
import { serializeSExpression } from '../../../src/parser/formatter';
import { carryDocumentLayout } from '../../../src/parser/layout';
import { parseSExpression, parseSingle } from '../../../src/parser/sexpr';

const fixture = readFileSync(fileURLToPath(new URL('../../fixtures/board.kicad_dru', import.meta.url)), 'utf-8');

describe('unit: design rules', () => {
  it('reads every rule with its constraints', () => {
    const rules = decodeDesignRules(parseSExpression(fixture));
    expect(rules.version).toBe(1);
    expect(rules.rules.map((r) => r.name)).toEqual(['HV clearance', 'No vias under BGA', 'Track width']);

    const [hv, noVias, width] = rules.rules;
    expect(hv.constraints[0]).toMatchObject({ constraintType: 'clearance', min: '1.5mm', args: [] });
    expect(hv.condition?.text).toBe("A.NetClass == 'HV' && !A.insideArea('Shield*')");
    expect(noVias.layer).toBe('outer');
    expect(noVias.constraints[0].args).toEqual(['via', 'micro_via']);
    expect(width.severity).toBe('warning');
    expect(width.constraints[0]).toMatchObject({ min: '0.2mm', opt: '0.25mm', max: '2mm' });
  });

  it('parses rule conditions on demand', () => {
    const rules = decodeDesignRules(parseSExpression(fixture));
    expect(rules.rules[0].condition?.expression.type).toBe('logical');
  });

  it('writes an unmodified rules file back byte for byte', () => {
    const source = parseSExpression(fixture);
    const fresh = encodeDesignRules(decodeDesignRules(source));
    carryDocumentLayout(fresh, source);
    expect(serializeSExpression(fresh)).toBe(fixture);
  });

  it('writes new rules canonically', () => {
    const rules = createDesignRules();
    const rule = ruleCodec.create();
    rule.name = 'Via clearance';
    rule.constraints = [{ constraintType: 'clearance', min: '0.2mm', args: [], extras: [] }];
    rule.condition = Condition.from(parseCondition("A.Type == 'Via'"));
    rules.rules.push(rule);

    expect(serializeSExpression(encodeDesignRules(rules))).toBe(
      '(version 1)\n(rule "Via clearance"\n\t(constraint clearance\n\t\t(min 0.2mm)\n\t)\n\t(condition "A.Type == \'Via\'")\n)\n',
    );
  });

  it('keeps numeric limits as numbers', () => {
    const constraint = constraintCodec.decode(parseSingle('(constraint hole_size (min 0.3))'));
    expect(constraint.min).toBe('0.3');
    expect(constraintCodec.encode(constraint).items[2]).toEqual({
      kind: 'list',
      items: [{ kind: 'symbol', value: 'min' }, { kind: 'float', value: 0.3, raw: '0.3' }],
    });
  });
});

describe('unit: commented design rules', () => {
  const commented = readFileSync(fileURLToPath(new URL('../../fixtures/commented.kicad_dru', import.meta.url)), 'utf-8');

  it('reads rules between comment lines', () => {
    const rules = decodeDesignRules(parseSExpression(commented, { lineComments: true }));
    expect(rules.rules.map((r) => r.name)).toEqual(['HV clearance', 'Track width']);
  });

  it('keeps the comments when a rule is added', () => {
    const source = parseSExpression(commented, { lineComments: true });
    const rules = decodeDesignRules(source);
    const rule = ruleCodec.create();
    rule.name = 'Via clearance';
    rule.constraints = [{ constraintType: 'clearance', min: '0.2mm', args: [], extras: [] }];
    rule.condition = Condition.from(parseCondition("A.Type == 'Via'"));
    rules.rules.push(rule);

    const fresh = encodeDesignRules(rules);
    carryDocumentLayout(fresh, source);
    expect(serializeSExpression(fresh)).toBe(
      commented +
        '(rule "Via clearance"\n\t(constraint clearance\n\t\t(min 0.2mm)\n\t)\n\t(condition "A.Type == \'Via\'")\n)\n',
    );
  });
});
