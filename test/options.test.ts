import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { InvalidArgumentError } from 'commander';
import { parseInteger } from '../src/options.js';

describe('parseInteger', () => {
  it('整数の文字列を数値にする', () => {
    assert.equal(parseInteger('4322'), 4322);
    assert.equal(parseInteger('-1'), -1);
  });

  it('数値でない値はInvalidArgumentError', () => {
    assert.throws(() => parseInteger('abc'), InvalidArgumentError);
  });

  it('小数や空文字は拒否する', () => {
    assert.throws(() => parseInteger('1.5'), /Not an integer: 1\.5/);
    assert.throws(() => parseInteger(''), InvalidArgumentError);
  });
});
