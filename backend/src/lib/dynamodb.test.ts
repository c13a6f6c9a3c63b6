import { describe, it, expect } from 'vitest';
import { isConditionalCheckFailure, stripKeys } from './dynamodb.js';

describe('dynamodb utilities', () => {
  describe('stripKeys', () => {
    it('removes PK and SK from item', () => {
      const item = {
        PK: 'ANALYSIS#01ARZ3NDEKTSV4RRFFQ69G5FAV',
        SK: 'META',
        analysisId: '01ARZ3NDEKTSV4RRFFQ69G5FAV',
        canonicalId: 'CHEMBL25',
      };
      expect(stripKeys(item)).toEqual({
        analysisId: '01ARZ3NDEKTSV4RRFFQ69G5FAV',
        canonicalId: 'CHEMBL25',
      });
    });

    it('removes GSI keys if present', () => {
      const item = {
        PK: 'COMPOUND#CHEMBL25',
        SK: 'META',
        GSI1PK: 'STRUCTURE#TEST-KEY',
        GSI1SK: 'COMPOUND#CHEMBL25',
        canonicalId: 'CHEMBL25',
      };
      const stripped = stripKeys(item);
      expect(stripped).toEqual({ canonicalId: 'CHEMBL25' });
      expect(stripped).not.toHaveProperty('GSI1PK');
    });

    it('does not modify original item', () => {
      const item = { PK: 'TEST#1', SK: 'META', id: '1' };
      stripKeys(item);
      expect(item.PK).toBe('TEST#1');
      expect(item.SK).toBe('META');
    });
  });

  describe('isConditionalCheckFailure', () => {
    it('recognizes the SDK exception by name', () => {
      const error = Object.assign(new Error('The conditional request failed'), {
        name: 'ConditionalCheckFailedException',
      });
      expect(isConditionalCheckFailure(error)).toBe(true);
    });

    it('ignores other errors and non-objects', () => {
      expect(isConditionalCheckFailure(new Error('throttled'))).toBe(false);
      expect(isConditionalCheckFailure(undefined)).toBe(false);
      expect(isConditionalCheckFailure('ConditionalCheckFailedException')).toBe(false);
    });
  });
});
