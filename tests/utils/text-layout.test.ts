import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { fillTemplate, formatParagraph, padding, usableWidth, visibleWidth } from '../../src/utils/text-layout.js';

describe('visibleWidth', () => {
  it('ignores escape sequences', () => {
    assert.equal(visibleWidth('\x1b[1mfoo\x1b[0m'), 3);
    assert.equal(visibleWidth('\x1b[1;32mcore/\x1b[0mbash'), 9);
  });
});

describe('padding', () => {
  it('never goes below the minimum', () => {
    assert.equal(padding(3, 1), '   ');
    assert.equal(padding(0, 1), ' ');
    assert.equal(padding(-7, 1), ' ');
  });
});

describe('formatParagraph', () => {
  it('indents a short description', () => {
    assert.equal(formatParagraph('hello world', 80), '    hello world');
  });

  it('wraps to the terminal width', () => {
    assert.equal(formatParagraph('alpha beta gamma delta', 20), '    alpha beta\n    gamma delta');
  });

  it('wraps at the default width when the terminal width is unusable', () => {
    assert.equal(formatParagraph('alpha beta gamma delta', 0), '    alpha beta gamma delta');
    assert.equal(formatParagraph('alpha beta gamma delta', -5), '    alpha beta gamma delta');
  });

  it('renders nothing for a blank description', () => {
    assert.equal(formatParagraph('   ', 80), '');
  });
});

describe('fillTemplate', () => {
  it('substitutes known placeholders', () => {
    assert.equal(fillTemplate('({days} days old)', { days: 3 }), '(3 days old)');
  });

  it('keeps unknown placeholders as written', () => {
    assert.equal(fillTemplate('{a} {b}', { a: 'x' }), 'x {b}');
  });
});

describe('usableWidth', () => {
  it('keeps positive widths and replaces the rest with 80', () => {
    assert.equal(usableWidth(40), 40);
    assert.equal(usableWidth(0), 80);
    assert.equal(usableWidth(-1), 80);
    assert.equal(usableWidth(Number.NaN), 80);
  });
});
