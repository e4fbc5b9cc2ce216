import { describe, expect, it } from 'vitest';
import { extractErrorDetails, isTreeloomError, wrapError } from '../src/errors/base.js';
import {
  InsufficientTraversalInfoError,
  ParenthesisParseError,
  UnsupportedFormatError,
} from '../src/errors/construction.js';

describe('Error handling', () => {
  it('names errors after their class', () => {
    const error = new UnsupportedFormatError('zigzag');

    expect(error.name).toBe('UnsupportedFormatError');
    expect(error.module).toBe('construction.dispatch');
    expect(error.operation).toBe('buildTree');
    expect(error).toBeInstanceOf(Error);
  });

  it('keeps in-order refusals inside the unsupported-format family', () => {
    const error = new InsufficientTraversalInfoError();

    expect(error).toBeInstanceOf(UnsupportedFormatError);
    expect(error.format).toBe('in_order');
    expect(error.name).toBe('InsufficientTraversalInfoError');
  });

  it('serializes to a structured object', () => {
    const json = new ParenthesisParseError('Unexpected character ")"', 4, '1(2))').toJSON();

    expect(json['message']).toBe('Unexpected character ")" at position 4');
    expect(json['module']).toBe('construction.parenthesis');
    expect(json['context']).toEqual({ position: 4, input: '1(2))' });
  });

  it('passes library errors through wrapError unchanged', () => {
    const error = new UnsupportedFormatError('zigzag');

    expect(wrapError(error, 'test', 'op')).toBe(error);
  });

  it('wraps foreign errors with module context', () => {
    const cause = new RangeError('too deep');
    const wrapped = wrapError(cause, 'construction.dispatch', 'buildTree');

    expect(isTreeloomError(wrapped)).toBe(true);
    expect(wrapped.message).toBe('too deep');
    expect(wrapped.module).toBe('construction.dispatch');
    expect(wrapped.context).toEqual({ cause });
  });

  it('wraps thrown non-errors', () => {
    expect(wrapError('boom', 'cli', 'run').message).toBe('boom');
  });

  it('extracts details for display', () => {
    expect(extractErrorDetails(new UnsupportedFormatError('zigzag'))).toMatchObject({
      message: 'Unsupported construction method: zigzag',
      module: 'construction.dispatch',
      operation: 'buildTree',
    });
    expect(extractErrorDetails(new Error('plain'))).toMatchObject({ message: 'plain' });
    expect(extractErrorDetails(7)).toEqual({ message: '7' });
  });
});
