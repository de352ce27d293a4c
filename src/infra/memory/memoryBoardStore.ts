import { Board, BoardStore } from '../../domain/board/board.js';
import { Clock, newId, systemClock } from '../../domain/id.js';
import { NotFoundError } from '../../application/errors.js';

// Callers get copies; mutating a returned Date must not reach the stored record.
function copyBoard(board: Board): Board {
  return {
    id: board.id,
    title: board.title,
    createdAt: new Date(board.createdAt.getTime()),
    updatedAt: new Date(board.updatedAt.getTime()),
  };
}

export class MemoryBoardStore implements BoardStore {
  // Insertion order is kept by Map; list() relies on it for ties.
  private readonly boards = new Map<string, Board>();

  constructor(private readonly now: Clock = systemClock) {}

  async list(): Promise<Board[]> {
    return [...this.boards.values()]
      .reverse()
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map(copyBoard);
  }

  async get(id: string): Promise<Board> {
    const board = this.boards.get(id);
    if (!board) {
      throw new NotFoundError('board not found');
    }
    return copyBoard(board);
  }

  async create(title: string): Promise<Board> {
    const now = this.now().getTime();
    const board: Board = {
      id: newId(),
      title,
      createdAt: new Date(now),
      updatedAt: new Date(now),
    };
    this.boards.set(board.id, board);
    return copyBoard(board);
  }

  async update(id: string, title: string): Promise<Board> {
    const existing = this.boards.get(id);
    if (!existing) {
      throw new NotFoundError('board not found');
    }

    // Records are replaced whole, never mutated in place.
    const updated: Board = { ...existing, title, updatedAt: new Date(this.now().getTime()) };
    this.boards.set(id, updated);
    return copyBoard(updated);
  }

  async delete(id: string): Promise<void> {
    if (!this.boards.delete(id)) {
      throw new NotFoundError('board not found');
    }
  }
}
