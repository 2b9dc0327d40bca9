/**
 * Tests for utils/weeklyProfile.
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { getWeeklyProfileAnalysis, parseBias } from '../src/utils/weeklyProfile';

describe('getWeeklyProfileAnalysis', () => {
  it('finds the Tuesday/Wednesday low after a Monday low run in a bullish week', () => {
    const tuesday = getWeeklyProfileAnalysis('Bullish', ['Mon Low Run'], 1);
    assert.equal(tuesday.length, 1);
    assert.equal(tuesday[0].name, 'Classic Tuesday/Wednesday Low of the Week');
    assert.equal(tuesday[0].probability, 'High');
    assert.equal(getWeeklyProfileAnalysis('Bullish', ['Mon Low Run'], 2)[0].probability, 'High');
  });

  it('waits for clarity otherwise', () => {
    assert.equal(getWeeklyProfileAnalysis('Bullish', ['Mon Low Run'], 3)[0].name, 'Awaiting Clarity');
    assert.equal(getWeeklyProfileAnalysis('Bullish', [], 1)[0].name, 'Awaiting Clarity');
    assert.equal(getWeeklyProfileAnalysis('Bearish', ['Mon Low Run'], 1)[0].name, 'Awaiting Clarity');
    assert.equal(getWeeklyProfileAnalysis('Bearish', [], 0)[0].action, 'Remain patient. Do not force a trade.');
  });
});

describe('parseBias', () => {
  it('accepts either case and rejects anything else', () => {
    assert.equal(parseBias(' bullish '), 'Bullish');
    assert.equal(parseBias('BEARISH'), 'Bearish');
    assert.equal(parseBias('neutral'), null);
  });
});
