import fs from 'fs/promises';
import path from 'path';
import { Checkpointer } from './types';

/** The slice of a pg `Pool` or `Client` the adapter needs. */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export interface StoredCheckpoint {
  nodeId: string;
  runId: string | null;
  state: unknown;
}

const SCHEMA_FILE = path.resolve(__dirname, '../../../sql/graph_checkpoints.sql');

function isCheckpointRow(row: unknown): row is { node_id: string; run_id: string | null; state: unknown } {
  if (typeof row !== 'object' || row === null) return false;
  return 'node_id' in row && typeof row.node_id === 'string' && 'state' in row;
}

/**
 * Persists the state after every node to `graph_checkpoints`. Rows are
 * append-only; the newest row for a graph (and optionally a run) wins.
 */
export class CheckpointAdapter implements Checkpointer {
  private readonly db: SqlClient;

  constructor(db: SqlClient) {
    this.db = db;
  }

  async ensureSchema(): Promise<void> {
    const ddl = await fs.readFile(SCHEMA_FILE, 'utf8');
    await this.db.query(ddl);
  }

  async save(graphId: string, nodeId: string, state: unknown, runId?: string): Promise<void> {
    await this.db.query(
      'INSERT INTO graph_checkpoints (graph_id, node_id, run_id, state) VALUES ($1, $2, $3, $4)',
      [graphId, nodeId, runId ?? null, JSON.stringify(state)],
    );
  }

  async loadLatest(graphId: string, runId?: string): Promise<StoredCheckpoint | null> {
    const { rows } = runId
      ? await this.db.query(
          'SELECT node_id, run_id, state FROM graph_checkpoints WHERE graph_id = $1 AND run_id = $2 ORDER BY id DESC LIMIT 1',
          [graphId, runId],
        )
      : await this.db.query(
          'SELECT node_id, run_id, state FROM graph_checkpoints WHERE graph_id = $1 ORDER BY id DESC LIMIT 1',
          [graphId],
        );
    const row = rows[0];
    if (!isCheckpointRow(row)) return null;
    return { nodeId: row.node_id, runId: row.run_id ?? null, state: row.state };
  }
}
