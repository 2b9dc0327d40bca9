/**
 * Tests for utils/impact.
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parseImpact } from '../src/utils/impact';

describe('parseImpact', () => {
  it('finds the level as a case-insensitive substring', () => {
    assert.equal(parseImpact('High Impact Expected'), 'High');
    assert.equal(parseImpact('MEDIUM'), 'Medium');
    assert.equal(parseImpact('low impact'), 'Low');
  });

  it('checks high before medium before low', () => {
    assert.equal(parseImpact('medium-high'), 'High');
    assert.equal(parseImpact('low to medium'), 'Medium');
  });

  it('defaults to Low', () => {
    assert.equal(parseImpact(''), 'Low');
    assert.equal(parseImpact(null), 'Low');
    assert.equal(parseImpact(undefined), 'Low');
    assert.equal(parseImpact('Holiday'), 'Low');
    assert.equal(parseImpact('red'), 'Low');
  });
});
