import { describe, expect, it, vi } from 'vitest';

import {
  jsonReplacer,
  serialiseError,
  writeJson,
  writeLine,
  type WritableTarget,
} from './formatting.js';

describe('reporting formatting helpers', () => {
  it('serialises error instances with stack traces when available', () => {
    const error = new Error('explode');
    error.stack = 'Error: explode\n    at here';
    expect(serialiseError(error)).toEqual({
      name: 'Error',
      message: 'explode',
      stack: error.stack,
    });
  });

  it('serialises non-error values with a default name', () => {
    expect(serialiseError('nope')).toEqual({
      name: 'UnknownError',
      message: 'nope',
    });
  });

  it('renders regular expressions as literals', () => {
    expect(jsonReplacer('test', /\.ya?ml$/)).toBe(String.raw`/\.ya?ml$/`);
    expect(jsonReplacer('loader', 'yaml-loader')).toBe('yaml-loader');
  });

  it('writes JSON payloads with a newline terminator', () => {
    const write = vi.fn();
    const target: WritableTarget = { write };
    writeJson(target, { value: 1 });
    expect(write).toHaveBeenCalledWith('{"value":1}\n');
  });

  it('indents JSON payloads when asked to', () => {
    const write = vi.fn();
    writeJson({ write }, { value: [1] }, { pretty: true });
    expect(write).toHaveBeenCalledWith('{\n  "value": [\n    1\n  ]\n}\n');
  });

  it('writes text payloads with a newline terminator', () => {
    const write = vi.fn();
    writeLine({ write }, 'hello');
    expect(write).toHaveBeenCalledWith('hello\n');
  });
});
