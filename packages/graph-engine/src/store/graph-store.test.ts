import { describe, it, expect } from 'vitest';
import { GraphDefinitionSchema } from '@graphrun/schemas';
import { InMemoryGraphStore } from './graph-store';

function sequentialIds(): () => string {
  let next = 0;
  return () => `graph-${++next}`;
}

describe('InMemoryGraphStore', () => {
  const definition = GraphDefinitionSchema.parse({
    name: 'pair',
    nodes: { a: { function: 'f' }, b: { function: 'f' } },
    edges: { a: 'b' },
  });

  it('should store graphs under fresh ids', () => {
    const store = new InMemoryGraphStore(sequentialIds());

    const first = store.create(definition);
    const second = store.create(definition);

    expect(first.id).toBe('graph-1');
    expect(second.id).toBe('graph-2');
    expect(store.get('graph-1')?.name).toBe('pair');
    expect(store.list().map((graph) => graph.id)).toEqual(['graph-1', 'graph-2']);
  });

  it('should return undefined for an unknown id', () => {
    expect(new InMemoryGraphStore().get('missing')).toBeUndefined();
  });

  it('should generate unique ids by default', () => {
    const store = new InMemoryGraphStore();
    const ids = new Set([store.create(definition).id, store.create(definition).id]);

    expect(ids.size).toBe(2);
  });
});
