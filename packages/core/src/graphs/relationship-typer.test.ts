import { KnowledgeGraphConfigSchema } from '@graphweave/shared';
import { describe, expect, it } from 'vitest';
import {
  isSymmetricRelationship,
  parseRelationshipType,
  RelationshipTyper,
  relationshipWeight,
} from './relationship-typer.js';

describe('relationshipWeight', () => {
  it('should scale confidence by the type base weight', () => {
    expect(relationshipWeight('hypernym', 0.9)).toBeCloseTo(9.0);
    expect(relationshipWeight('generic', 0.8)).toBeCloseTo(4.0);
    expect(relationshipWeight('synonym', 0.95)).toBeCloseTo(9.025);
    expect(relationshipWeight('causal', 0.7)).toBeCloseTo(5.6);
  });

  it('should clamp confidence into [0, 1]', () => {
    expect(relationshipWeight('hypernym', 1.5)).toBe(10);
    expect(relationshipWeight('hypernym', -1)).toBe(0);
  });
});

describe('parseRelationshipType', () => {
  it('should accept known types case-insensitively', () => {
    expect(parseRelationshipType('Synonym')).toBe('synonym');
    expect(parseRelationshipType(' causal ')).toBe('causal');
  });

  it('should map unknown types to generic', () => {
    expect(parseRelationshipType('works_with')).toBe('generic');
    expect(parseRelationshipType('')).toBe('generic');
  });
});

describe('isSymmetricRelationship', () => {
  it('should be true only for synonym and antonym', () => {
    expect(isSymmetricRelationship('synonym')).toBe(true);
    expect(isSymmetricRelationship('antonym')).toBe(true);
    expect(isSymmetricRelationship('causal')).toBe(false);
    expect(isSymmetricRelationship('hypernym')).toBe(false);
  });
});

describe('RelationshipTyper', () => {
  it('should type and mirror when enhanced', () => {
    const typer = new RelationshipTyper(
      KnowledgeGraphConfigSchema.parse({ enableEnhancedKg: true }),
    );
    expect(typer.resolveType('hypernym')).toBe('hypernym');
    expect(typer.shouldMirror('synonym')).toBe(true);
    expect(typer.shouldMirror('causal')).toBe(false);
  });

  it('should collapse to generic without mirroring in legacy mode', () => {
    const typer = new RelationshipTyper(
      KnowledgeGraphConfigSchema.parse({ enableEnhancedKg: false }),
    );
    expect(typer.resolveType('hypernym')).toBe('generic');
    expect(typer.shouldMirror('synonym')).toBe(false);
  });

  it('should honour the symmetric toggle', () => {
    const typer = new RelationshipTyper(
      KnowledgeGraphConfigSchema.parse({
        enableEnhancedKg: true,
        createSymmetricRelationships: false,
      }),
    );
    expect(typer.shouldMirror('synonym')).toBe(false);
  });
});
