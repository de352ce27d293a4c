import type { Queryable } from './pool.js';
import { Board, BoardStore } from '../../domain/board/board.js';
import { Clock, newId, systemClock } from '../../domain/id.js';
import { NotFoundError } from '../../application/errors.js';

interface BoardRow {
  id: string;
  title: string;
  created_at: Date;
  updated_at: Date;
}

function toBoard(row: BoardRow): Board {
  return {
    id: row.id,
    title: row.title,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class PgBoardRepo implements BoardStore {
  constructor(
    private readonly db: Queryable,
    private readonly now: Clock = systemClock
  ) {}

  async list(): Promise<Board[]> {
    const result = await this.db.query<BoardRow>(
      'SELECT id, title, created_at, updated_at FROM boards ORDER BY created_at DESC, id'
    );
    return result.rows.map(toBoard);
  }

  async get(id: string): Promise<Board> {
    const result = await this.db.query<BoardRow>(
      'SELECT id, title, created_at, updated_at FROM boards WHERE id = $1',
      [id]
    );

    const row = result.rows[0];
    if (!row) {
      throw new NotFoundError('board not found');
    }
    return toBoard(row);
  }

  async create(title: string): Promise<Board> {
    const now = this.now();
    const result = await this.db.query<BoardRow>(
      `INSERT INTO boards (id, title, created_at, updated_at)
       VALUES ($1, $2, $3, $3)
       RETURNING id, title, created_at, updated_at`,
      [newId(), title, now]
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error('INSERT INTO boards returned no row');
    }
    return toBoard(row);
  }

  async update(id: string, title: string): Promise<Board> {
    // Single statement: concurrent updates to one board cannot lose writes.
    const result = await this.db.query<BoardRow>(
      `UPDATE boards SET title = $2, updated_at = $3
       WHERE id = $1
       RETURNING id, title, created_at, updated_at`,
      [id, title, this.now()]
    );

    const row = result.rows[0];
    if (!row) {
      throw new NotFoundError('board not found');
    }
    return toBoard(row);
  }

  async delete(id: string): Promise<void> {
    const result = await this.db.query('DELETE FROM boards WHERE id = $1', [id]);
    if (result.rowCount === 0) {
      throw new NotFoundError('board not found');
    }
  }
}
