/**
 * Tests for src/stats.ts
 */
import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import type Database from 'better-sqlite3';
import { logAccess } from '../src/access-log.js';
import {
  getGraphStats, mostAccessedNode, mostConnectedNode, nodeGrowth, priorityBreakdown, relationshipBreakdown,
} from '../src/stats.js';
import { createTestDb, insertTestEdge, insertTestNode } from './helpers/test-db.js';

describe('Stats Aggregator', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = createTestDb();
  });

  afterEach(() => {
    db.close();
  });

  describe('empty store', () => {
    it('should report zeros and nulls', () => {
      assert.deepStrictEqual(getGraphStats(db), {
        total_nodes: 0,
        total_edges: 0,
        total_accesses: 0,
        most_connected_node: null,
        most_accessed_node: null,
        growth: [],
        growth_interval: 'day',
        access_breakdown: { search: 0, navigate: 0 },
        relationship_breakdown: [],
        priority_breakdown: { critical: 0, high: 0, normal: 0, low: 0 },
      });
    });
  });

  describe('structure', () => {
    it('should count nodes and edges and find the hub', () => {
      insertTestNode(db, { id: 'a', content: 'Hub node' });
      insertTestNode(db, { id: 'b' });
      insertTestNode(db, { id: 'c' });
      insertTestEdge(db, 'a', 'b');
      insertTestEdge(db, 'a', 'c');

      const stats = getGraphStats(db);
      assert.strictEqual(stats.total_nodes, 3);
      assert.strictEqual(stats.total_edges, 2);
      assert.deepStrictEqual(stats.most_connected_node, { id: 'a', content_snippet: 'Hub node', degree: 2 });
    });

    it('should count in-degree and out-degree together', () => {
      insertTestNode(db, { id: 'a' });
      insertTestNode(db, { id: 'b' });
      insertTestNode(db, { id: 'c' });
      insertTestEdge(db, 'a', 'b');
      insertTestEdge(db, 'c', 'b');
      insertTestEdge(db, 'b', 'a', 'answers');
      assert.strictEqual(mostConnectedNode(db)?.id, 'b');
      assert.strictEqual(mostConnectedNode(db)?.degree, 3);
    });

    it('should break degree ties by smallest id', () => {
      insertTestNode(db, { id: 'm' });
      insertTestNode(db, { id: 'k' });
      insertTestEdge(db, 'm', 'k');
      assert.strictEqual(mostConnectedNode(db)?.id, 'k');
    });

    it('should snippet long content', () => {
      insertTestNode(db, { id: 'a', content: 'y'.repeat(120) });
      assert.strictEqual(mostConnectedNode(db)?.content_snippet, 'y'.repeat(100) + '...');
    });
  });

  describe('usage', () => {
    it('should find the most accessed node', () => {
      insertTestNode(db, { id: 'a' });
      insertTestNode(db, { id: 'b' });
      logAccess(db, 'b', 'search', 't1');
      logAccess(db, 'b', 'navigate', 't2');
      logAccess(db, 'a', 'search', 't3');

      const stats = getGraphStats(db);
      assert.strictEqual(stats.most_accessed_node?.id, 'b');
      assert.strictEqual(stats.most_accessed_node?.access_count, 2);
      assert.strictEqual(stats.total_accesses, 3);
      assert.deepStrictEqual(stats.access_breakdown, { search: 2, navigate: 1 });
    });

    it('should break access ties by earliest creation, then id', () => {
      insertTestNode(db, { id: 'a', access_count: 3, created_at: '2026-01-02T00:00:00.000Z' });
      insertTestNode(db, { id: 'z', access_count: 3, created_at: '2026-01-01T00:00:00.000Z' });
      assert.strictEqual(mostAccessedNode(db)?.id, 'z');

      insertTestNode(db, { id: 'y', access_count: 3, created_at: '2026-01-01T00:00:00.000Z' });
      assert.strictEqual(mostAccessedNode(db)?.id, 'y');
    });
  });

  describe('growth', () => {
    beforeEach(() => {
      insertTestNode(db, { id: 'n1', created_at: '2026-01-01T10:00:00.000Z' });
      insertTestNode(db, { id: 'n2', created_at: '2026-01-01T11:30:00.000Z' });
      insertTestNode(db, { id: 'n3', created_at: '2026-01-02T09:00:00.000Z' });
      insertTestNode(db, { id: 'n4', created_at: '2026-02-05T00:00:00.000Z' });
    });

    it('should bucket by day by default', () => {
      assert.deepStrictEqual(nodeGrowth(db), [
        { bucket: '2026-01-01', count: 2 },
        { bucket: '2026-01-02', count: 1 },
        { bucket: '2026-02-05', count: 1 },
      ]);
    });

    it('should bucket by month', () => {
      assert.deepStrictEqual(nodeGrowth(db, 'month'), [
        { bucket: '2026-01', count: 3 },
        { bucket: '2026-02', count: 1 },
      ]);
    });

    it('should bucket by hour', () => {
      assert.deepStrictEqual(nodeGrowth(db, 'hour').map(b => b.bucket), [
        '2026-01-01T10', '2026-01-01T11', '2026-01-02T09', '2026-02-05T00',
      ]);
    });

    it('should echo the interval in the aggregate', () => {
      assert.strictEqual(getGraphStats(db, 'month').growth_interval, 'month');
    });
  });

  describe('breakdowns', () => {
    it('should count labels most used first, verbatim', () => {
      insertTestNode(db, { id: 'a' });
      insertTestNode(db, { id: 'b' });
      insertTestNode(db, { id: 'c' });
      insertTestEdge(db, 'a', 'b', 'builds_on');
      insertTestEdge(db, 'b', 'c', 'builds_on');
      insertTestEdge(db, 'a', 'c', 'buildsOn');
      insertTestEdge(db, 'c', 'a', 'supports');

      assert.deepStrictEqual(relationshipBreakdown(db), [
        { relationship: 'builds_on', count: 2 },
        { relationship: 'buildsOn', count: 1 },
        { relationship: 'supports', count: 1 },
      ]);
    });

    it('should count nodes per priority', () => {
      insertTestNode(db, { id: 'a', priority: 'critical' });
      insertTestNode(db, { id: 'b', priority: 'low' });
      insertTestNode(db, { id: 'c', priority: 'low' });
      insertTestNode(db, { id: 'd' });
      assert.deepStrictEqual(priorityBreakdown(db), { critical: 1, high: 0, normal: 1, low: 2 });
    });
  });
});
