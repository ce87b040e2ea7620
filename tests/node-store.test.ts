/**
 * Tests for src/node-store.ts
 */
import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import type Database from 'better-sqlite3';
import { ConflictError, NotFoundError, StorageError } from '../src/errors.js';
import {
  findNode, generateNodeId, getNode, insertNodeRow, listCandidates, listNodes, snippet, toSummary,
} from '../src/node-store.js';
import { createTestDb, insertTestNode } from './helpers/test-db.js';
import { CATS, KITTENS, vec } from './helpers/embeddings.js';

describe('Node Store', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = createTestDb();
  });

  afterEach(() => {
    db.close();
  });

  describe('insertNodeRow', () => {
    it('should persist every field and round-trip the embedding', () => {
      const inserted = insertNodeRow(db, {
        content: CATS,
        tags: ['pets', 'cats'],
        priority: 'high',
        embedding: vec([1, 0, 0, 0]),
        createdAt: '2026-01-01T00:00:00.000Z',
      });

      assert.match(inserted.id, /^node-[0-9a-f]{12}$/);
      assert.strictEqual(inserted.access_count, 0);

      const stored = getNode(db, inserted.id);
      assert.strictEqual(stored.content, CATS);
      assert.deepStrictEqual(stored.tags, ['pets', 'cats']);
      assert.strictEqual(stored.priority, 'high');
      assert.strictEqual(stored.created_at, '2026-01-01T00:00:00.000Z');
      assert.deepStrictEqual(Array.from(stored.embedding), [1, 0, 0, 0]);
    });

    it('should honour an explicit id', () => {
      const node = insertNodeRow(db, {
        id: 'my-id', content: 'x', tags: [], priority: 'normal', embedding: vec([1, 0, 0, 0]), createdAt: '2026-01-01',
      });
      assert.strictEqual(node.id, 'my-id');
    });

    it('should refuse an id that already exists', () => {
      insertTestNode(db, { id: 'taken' });
      assert.throws(
        () => insertNodeRow(db, {
          id: 'taken', content: 'x', tags: [], priority: 'normal', embedding: vec([1, 0, 0, 0]), createdAt: '2026-01-01',
        }),
        (err: unknown) => err instanceof ConflictError && err.message === 'Node taken already exists',
      );
    });
  });

  describe('getNode / findNode', () => {
    it('should return undefined or throw for a missing id', () => {
      assert.strictEqual(findNode(db, 'ghost'), undefined);
      assert.throws(
        () => getNode(db, 'ghost'),
        (err: unknown) => err instanceof NotFoundError && err.message === 'Node ghost not found',
      );
    });

    it('should refuse a row with an unknown priority', () => {
      insertTestNode(db, { id: 'odd' });
      db.pragma('ignore_check_constraints = ON');
      db.prepare(`UPDATE nodes SET priority = 'urgent' WHERE id = 'odd'`).run();
      assert.throws(() => getNode(db, 'odd'), StorageError);
    });
  });

  describe('listCandidates', () => {
    beforeEach(() => {
      insertTestNode(db, { id: 'c', content: CATS, tags: ['pets'] });
      insertTestNode(db, { id: 'a', content: KITTENS, tags: ['pets', 'young'] });
      insertTestNode(db, { id: 'b', tags: ['finance'] });
    });

    it('should return every node ordered by id', () => {
      assert.deepStrictEqual(listCandidates(db).map(n => n.id), ['a', 'b', 'c']);
    });

    it('should keep nodes sharing any requested tag', () => {
      assert.deepStrictEqual(listCandidates(db, { tags: ['young', 'finance'] }).map(n => n.id), ['a', 'b']);
      assert.deepStrictEqual(listCandidates(db, { tags: ['unknown'] }), []);
    });

    it('should treat an empty tag list as no filter', () => {
      assert.strictEqual(listCandidates(db, { tags: [] }).length, 3);
    });

    it('should exclude one id', () => {
      assert.deepStrictEqual(listCandidates(db, { tags: ['pets'], excludeId: 'a' }).map(n => n.id), ['c']);
    });
  });

  describe('listNodes', () => {
    it('should list summaries in creation order without embeddings', () => {
      insertTestNode(db, { id: 'z', created_at: '2026-01-01T00:00:00.000Z' });
      insertTestNode(db, { id: 'y', created_at: '2026-01-02T00:00:00.000Z' });

      const nodes = listNodes(db);
      assert.deepStrictEqual(nodes.map(n => n.id), ['z', 'y']);
      const [first] = nodes;
      assert.ok(first);
      assert.ok(!('embedding' in first));
    });
  });

  describe('helpers', () => {
    it('should cut snippets and mark the cut', () => {
      assert.strictEqual(snippet('short', 10), 'short');
      assert.strictEqual(snippet('abcdefghij', 10), 'abcdefghij');
      assert.strictEqual(snippet('abcdefghijk', 10), 'abcdefghij...');
    });

    it('should generate distinct ids', () => {
      const ids = new Set(Array.from({ length: 50 }, generateNodeId));
      assert.strictEqual(ids.size, 50);
    });

    it('should drop the embedding from summaries', () => {
      const summary = toSummary(insertTestNode(db, { id: 's' }));
      assert.deepStrictEqual(Object.keys(summary).sort(), ['access_count', 'content', 'created_at', 'id', 'priority', 'tags']);
    });
  });
});
