/**
 * Tests for src/edge-store.ts
 */
import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import type Database from 'better-sqlite3';
import {
  countEdges, findEdge, incomingEdges, insertEdgeRow, listEdges, outgoingEdges, semanticStrength,
} from '../src/edge-store.js';
import type { MemoryNode } from '../src/types.js';
import { createTestDb, insertTestNode } from './helpers/test-db.js';
import { BONDS, CATS, DOGS, KITTENS } from './helpers/embeddings.js';

describe('Edge Store', () => {
  let db: Database.Database;
  let cats: MemoryNode;
  let kittens: MemoryNode;
  let bonds: MemoryNode;

  beforeEach(() => {
    db = createTestDb();
    cats = insertTestNode(db, { id: 'a', content: CATS, tags: ['pets'] });
    kittens = insertTestNode(db, { id: 'b', content: KITTENS });
    bonds = insertTestNode(db, { id: 'c', content: BONDS });
  });

  afterEach(() => {
    db.close();
  });

  describe('semanticStrength', () => {
    it('should rescale the endpoint cosine into [0, 1]', () => {
      const dogs = insertTestNode(db, { id: 'd', content: DOGS });
      assert.ok(Math.abs(semanticStrength(cats, kittens) - 0.9) < 1e-9);
      assert.strictEqual(semanticStrength(cats, bonds), 0.5);
      assert.strictEqual(semanticStrength(cats, dogs), 0);
    });
  });

  describe('insertEdgeRow', () => {
    it('should store the edge with a derived strength', () => {
      const { edge, created } = insertEdgeRow(db, {
        source: cats, target: kittens, relationship: 'builds_on', createdAt: '2026-01-01T00:00:00.000Z',
      });

      assert.strictEqual(created, true);
      assert.strictEqual(typeof edge.id, 'number');
      assert.strictEqual(edge.source_id, 'a');
      assert.strictEqual(edge.target_id, 'b');
      assert.strictEqual(edge.relationship, 'builds_on');
      assert.strictEqual(edge.created_at, '2026-01-01T00:00:00.000Z');
      assert.strictEqual(edge.semantic_strength, 0.9);
    });

    it('should return the existing edge for an identical triple', () => {
      const first = insertEdgeRow(db, { source: cats, target: kittens, relationship: 'supports', createdAt: 't1' });
      const second = insertEdgeRow(db, { source: cats, target: kittens, relationship: 'supports', createdAt: 't2' });

      assert.strictEqual(second.created, false);
      assert.strictEqual(second.edge.id, first.edge.id);
      assert.strictEqual(second.edge.created_at, 't1');
      assert.strictEqual(countEdges(db), 1);
    });

    it('should allow parallel edges with other labels and the reverse direction', () => {
      insertEdgeRow(db, { source: cats, target: kittens, relationship: 'supports', createdAt: 't1' });
      insertEdgeRow(db, { source: cats, target: kittens, relationship: 'builds_on', createdAt: 't2' });
      insertEdgeRow(db, { source: kittens, target: cats, relationship: 'supports', createdAt: 't3' });
      assert.strictEqual(countEdges(db), 3);
    });

    it('should keep labels verbatim', () => {
      insertEdgeRow(db, { source: cats, target: kittens, relationship: 'buildsOn', createdAt: 't1' });
      assert.ok(findEdge(db, 'a', 'b', 'buildsOn'));
      assert.strictEqual(findEdge(db, 'a', 'b', 'builds_on'), undefined);
    });
  });

  describe('neighbors', () => {
    beforeEach(() => {
      insertEdgeRow(db, { source: cats, target: kittens, relationship: 'builds_on', createdAt: 't1' });
      insertEdgeRow(db, { source: bonds, target: cats, relationship: 'contrasts', createdAt: 't2' });
      insertEdgeRow(db, { source: cats, target: bonds, relationship: 'unrelated', createdAt: 't3' });
    });

    it('should join outgoing edges with target content', () => {
      const rows = outgoingEdges(db, 'a');
      assert.deepStrictEqual(rows.map(r => [r.target_id, r.relationship]), [['b', 'builds_on'], ['c', 'unrelated']]);
      assert.strictEqual(rows[0]?.neighbor_content, KITTENS);
    });

    it('should join incoming edges with source content', () => {
      const rows = incomingEdges(db, 'a');
      assert.strictEqual(rows.length, 1);
      assert.strictEqual(rows[0]?.source_id, 'c');
      assert.strictEqual(rows[0]?.neighbor_content, BONDS);
      assert.strictEqual(rows[0]?.neighbor_tags, '[]');
    });

    it('should list every edge in creation order', () => {
      assert.deepStrictEqual(listEdges(db).map(e => e.relationship), ['builds_on', 'contrasts', 'unrelated']);
    });
  });
});
