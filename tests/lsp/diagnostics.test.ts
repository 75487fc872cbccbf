/**
 * Diagnostics Tests
 * Parse errors and lint findings as editor diagnostics
 */

import { describe, expect, it } from 'vitest';
import { parseDocument } from '../../src/document.js';
import {
  analyzeDocument,
  errorCodeFromMessage,
  estimateErrorWidth,
} from '../../src/lsp/index.js';

const analyze = (text: string) => analyzeDocument(parseDocument(text));

describe('estimateErrorWidth', () => {
  it('checks the message in a fixed order', () => {
    expect(estimateErrorWidth("Invalid identifier 'x' - UPPER_SNAKE_CASE")).toBe(10);
    expect(estimateErrorWidth("Expected ')', found number 2")).toBe(5);
    expect(estimateErrorWidth('names must use UPPER_SNAKE_CASE')).toBe(15);
    expect(estimateErrorWidth('Invalid statement')).toBe(8);
  });
});

describe('errorCodeFromMessage', () => {
  it('maps message text to editor codes', () => {
    expect(errorCodeFromMessage('must use UPPER_SNAKE_CASE')).toBe('E001');
    expect(errorCodeFromMessage('Unexpected token in expression')).toBe('E002');
    expect(errorCodeFromMessage('Expected identifier')).toBe('E003');
    expect(errorCodeFromMessage('Invalid expression - bad')).toBe('E004');
    expect(errorCodeFromMessage('Invalid statement - bad')).toBe('E000');
  });
});

describe('analyzeDocument', () => {
  describe('parse errors', () => {
    it('reports a naming error', () => {
      expect(analyze('Set x 1')).toEqual([
        {
          range: {
            start: { line: 0, character: 4 },
            end: { line: 0, character: 14 },
          },
          severity: 1,
          code: 'E001',
          source: 'aether-parser',
          message:
            "Invalid identifier 'x' - variable and function names must use UPPER_SNAKE_CASE (e.g. MY_VAR, CALCULATE_SUM)",
        },
      ]);
    });

    it('reports an unexpected token', () => {
      const [diagnostic] = analyze('PRINT(1 2)');
      expect(diagnostic?.code).toBe('E003');
      expect(diagnostic?.range).toEqual({
        start: { line: 0, character: 8 },
        end: { line: 0, character: 13 },
      });
    });

    it('classifies other parse errors', () => {
      expect(analyze('Set X )')[0]?.code).toBe('E002');
      expect(analyze('Set X @')[0]).toMatchObject({
        code: 'E004',
        range: {
          start: { line: 0, character: 6 },
          end: { line: 0, character: 14 },
        },
      });
      expect(analyze('Try { }')[0]).toMatchObject({
        code: 'E000',
        range: {
          start: { line: 0, character: 0 },
          end: { line: 0, character: 8 },
        },
      });
    });

    it('skips lint while the document has a syntax error', () => {
      const diagnostics = analyze('Set ÄPFEL 1\nSet X (');
      expect(diagnostics).toHaveLength(1);
      expect(diagnostics[0]?.source).toBe('aether-parser');
    });
  });

  describe('lint findings', () => {
    it('reports a non-ASCII declaration name', () => {
      expect(analyze('Set ÄPFEL 1')).toEqual([
        {
          range: {
            start: { line: 0, character: 4 },
            end: { line: 0, character: 9 },
          },
          severity: 2,
          code: 'W001',
          source: 'aether-lint',
          message: "Name 'ÄPFEL' should use UPPER_SNAKE_CASE\nSuggestion: ÄPFEL",
        },
      ]);
    });

    it('reports names with non-ASCII digits', () => {
      expect(analyze('Set A٣ 1')[0]?.range).toEqual({
        start: { line: 0, character: 4 },
        end: { line: 0, character: 6 },
      });
    });

    it('returns nothing for a clean document', () => {
      expect(analyze('Set TOTAL 1\nPRINTLN(TOTAL)')).toEqual([]);
    });

    it('honors the lint configuration', () => {
      const doc = parseDocument('Set ÄPFEL 1');
      expect(
        analyzeDocument(doc, doc.text, {
          rules: { NAMING_UPPER_SNAKE_CASE: 'off' },
          severity: {},
        })
      ).toEqual([]);
      expect(
        analyzeDocument(doc, doc.text, {
          rules: { NAMING_UPPER_SNAKE_CASE: 'on' },
          severity: { NAMING_UPPER_SNAKE_CASE: 'info' },
        })[0]?.severity
      ).toBe(3);
    });

    it('lints the text it is given', () => {
      const doc = parseDocument('Set TOTAL 1');
      expect(analyzeDocument(doc, 'Set ÄPFEL 1')).toHaveLength(1);
    });
  });
});
