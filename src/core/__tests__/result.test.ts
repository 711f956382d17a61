import { describe, it, expect } from 'vitest';
import { Err, Ok, safeSync } from '../result.js';

describe('Result', () => {
  it('builds ok and error results', () => {
    expect(Ok(3)).toEqual({ ok: true, value: 3 });
    expect(Err('nope')).toEqual({ ok: false, error: 'nope' });
  });

  it('captures a thrown error with safeSync', () => {
    const result = safeSync(() => {
      throw new Error('EACCES');
    });

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('EACCES');
  });

  it('wraps non-Error throwables', () => {
    const result = safeSync(() => {
      throw 'bare string';
    });

    expect(result).toEqual({ ok: false, error: new Error('bare string') });
  });

  it('returns the value on success', () => {
    expect(safeSync(() => 42)).toEqual({ ok: true, value: 42 });
  });
});
