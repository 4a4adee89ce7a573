import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import { ValidationError } from '@runcard/runtime';
import { openStore } from './stores.js';

describe('openStore', () => {
  it('opens an in-memory store', async () => {
    const store = await openStore({ store: 'memory', output: 'results' });

    expect(store.kind).toBe('memory');
    const run = await store.repositories.runs.create({ name: 'Henon ramp' });
    expect(await store.repositories.runs.get(run.id)).toMatchObject({ name: 'Henon ramp', status: 'running' });
    await store.close();
  });

  it('roots a bundle store at the output directory', async () => {
    const store = await openStore({ store: 'bundle', output: 'results' });

    expect(store.kind).toBe('bundle');
    expect(store.location).toBe(resolve('results'));
  });

  it('needs a database URL for postgres', async () => {
    await expect(openStore({ store: 'postgres', output: 'results' })).rejects.toThrow(ValidationError);
    await expect(openStore({ store: 'postgres', output: 'results' })).rejects.toThrow(
      '--store postgres needs --database-url or DATABASE_URL'
    );
  });
});
