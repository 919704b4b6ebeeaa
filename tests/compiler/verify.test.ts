import { compile } from '../../src/compiler/CompiledConstruct';
import { verifyCompiled } from '../../src/compiler/verify';
import { CheckError } from '../../src/errors';
import { Rebuild } from '../../src/constructs/Adapter';
import { GreedyBytes } from '../../src/constructs/Bytes';
import { Int16ub, Int8sb, Int8ub } from '../../src/constructs/FormatField';

describe('verifyCompiled', () => {
  it('accepts matching values and matching errors', () => {
    expect(() => verifyCompiled(Int16ub, compile(Int16ub), [Uint8Array.of(0, 1), Uint8Array.of(1)])).not.toThrow();
  });

  it('reports differing parse results', () => {
    expect(() => verifyCompiled(Int8ub, Int8sb, [Uint8Array.of(0xff)])).toThrow(CheckError);
    expect(() => verifyCompiled(Int8ub, Int8sb, [Uint8Array.of(0xff)])).toThrow(
      'payload 0: interpreted parse gave 255, compiled gave -1',
    );
  });

  it('describes errors by kind and path', () => {
    expect(() => verifyCompiled(Int16ub, Int8ub, [Uint8Array.of(1)])).toThrow(
      'payload 0: interpreted parse gave StreamError at (parsing), compiled gave 1',
    );
  });

  it('reports differing rebuilt bytes', () => {
    expect(() => verifyCompiled(Int8ub, new Rebuild(Int8ub, 7), [Uint8Array.of(0), Uint8Array.of(1)])).toThrow(
      'payload 0: interpreted build gave <00>, compiled gave <07>',
    );
  });

  it('compares static sizes', () => {
    expect(() => verifyCompiled(Int8ub, Int16ub, [])).toThrow('interpreted sizeof gave 1, compiled gave 2');
    expect(() => verifyCompiled(GreedyBytes, Int8ub, [])).toThrow(
      'interpreted sizeof gave SizeofError at (sizeof), compiled gave 1',
    );
  });

  it('accepts matching sizing errors', () => {
    expect(() => verifyCompiled(GreedyBytes, compile(GreedyBytes), [Uint8Array.of(1, 2)])).not.toThrow();
  });
});
