import type { Board, BoardStore } from '../../domain/board/board.js';
import { InvalidInputError } from '../errors.js';

function requireTitle(title: string): string {
  const trimmed = title.trim();
  if (trimmed === '') {
    throw new InvalidInputError('title required');
  }
  return trimmed;
}

export class BoardService {
  constructor(private boards: BoardStore) {}

  async listBoards(): Promise<Board[]> {
    return this.boards.list();
  }

  async getBoard(id: string): Promise<Board> {
    return this.boards.get(id);
  }

  async createBoard(title: string): Promise<Board> {
    return this.boards.create(requireTitle(title));
  }

  async updateBoard(id: string, title: string): Promise<Board> {
    return this.boards.update(id, requireTitle(title));
  }

  async deleteBoard(id: string): Promise<void> {
    return this.boards.delete(id);
  }
}
