import { describe, it, expect } from 'vitest';
import { openDb, closeDb } from '../db.js';

describe('openDb', () => {
  it('opens an in-memory database', () => {
    const db = openDb(':memory:');
    expect(db.open).toBe(true);
    expect(db.pragma('foreign_keys', { simple: true })).toBe(1);
    closeDb(db);
  });
});

describe('closeDb', () => {
  it('closes the handle and tolerates a second call', () => {
    const db = openDb(':memory:');
    closeDb(db);
    expect(db.open).toBe(false);
    expect(() => closeDb(db)).not.toThrow();
  });
});
