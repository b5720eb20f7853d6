import { describe, expect, it } from 'vitest';
import {
  GraphMutationGate,
  IngestionScheduler,
  KnowledgeGraphIndex,
  VERSION,
  WeightedRetriever,
} from './index.js';

describe('core', () => {
  it('exports VERSION', () => {
    expect(VERSION).toBe('0.1.0');
  });

  it('exports the pipeline components', () => {
    expect(GraphMutationGate).toBeDefined();
    expect(IngestionScheduler).toBeDefined();
    expect(WeightedRetriever).toBeDefined();
    expect(KnowledgeGraphIndex).toBeDefined();
  });
});
