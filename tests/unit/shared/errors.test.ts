import { describe, it, expect } from 'vitest';
import {
  ConditionSyntaxError,
  FileIOError,
  KicadFileError,
  SExprSyntaxError,
  SchemaError,
  UnsupportedVersionError,
} from '../../../src/shared/errors';

describe('unit: errors', () => {
  it('puts the position into syntax error messages', () => {
    const error = new SExprSyntaxError('Unexpected closing parenthesis', { offset: 9, line: 2, column: 3 });
    expect(error.message).toBe('Unexpected closing parenthesis (line 2, column 3)');
    expect(error).toBeInstanceOf(KicadFileError);
  });

  it('locates condition errors inside the condition string', () => {
    const error = new ConditionSyntaxError('Unterminated string', "a == 'x", 5);
    expect(error.position).toEqual({ offset: 5, line: 1, column: 6 });
    expect(error).toBeInstanceOf(SExprSyntaxError);
  });

  it('names the construct, field and values of schema errors', () => {
    const error = new SchemaError('via', 'size', 'a number', "symbol 'x'");
    expect(error.message).toBe("Invalid 'via': field 'size' expected a number, found symbol 'x'");
  });

  it('keeps the underlying cause', () => {
    const cause = new Error('EACCES');
    const io = new FileIOError('/tmp/x.kicad_pcb', 'write', cause);
    expect(io.message).toBe("Failed to write '/tmp/x.kicad_pcb': EACCES");
    expect(io.cause).toBe(cause);

    const schema = new SchemaError('pad', 'at', "'(at ...)'", 'nothing');
    const version = new UnsupportedVersionError('footprint', '20991231', schema);
    expect(version.message).toBe(`Cannot decode footprint file with version 20991231: ${schema.message}`);
    expect(version.cause).toBe(schema);
  });
});
