import { describe, it, expect, beforeEach } from 'vitest';
import { BoardService } from '../boardService.js';
import { InvalidInputError, NotFoundError } from '../../errors.js';
import { MemoryBoardStore } from '../../../infra/memory/memoryBoardStore.js';

describe('BoardService', () => {
  let current: Date;
  let store: MemoryBoardStore;
  let service: BoardService;

  beforeEach(() => {
    current = new Date('2026-01-01T00:00:00.000Z');
    store = new MemoryBoardStore(() => current);
    service = new BoardService(store);
  });

  it('trims the title on create', async () => {
    const board = await service.createBoard('  My Board  ');

    expect(board.title).toBe('My Board');
    await expect(store.get(board.id)).resolves.toMatchObject({ title: 'My Board' });
  });

  it.each(['', '   ', '\t\n'])('rejects the blank title %j', async (title) => {
    await expect(service.createBoard(title)).rejects.toThrow(new InvalidInputError('title required'));
    await expect(store.list()).resolves.toEqual([]);
  });

  it('updates the title and advances updatedAt', async () => {
    const board = await service.createBoard('Sprint 1');
    current = new Date('2026-01-01T01:00:00.000Z');

    const updated = await service.updateBoard(board.id, ' Sprint One ');

    expect(updated.title).toBe('Sprint One');
    expect(updated.createdAt).toEqual(board.createdAt);
    expect(updated.updatedAt.getTime()).toBeGreaterThan(board.updatedAt.getTime());
  });

  it('validates the title before looking up the board', async () => {
    await expect(service.updateBoard('missing', '  ')).rejects.toBeInstanceOf(InvalidInputError);
  });

  it('fails with NotFoundError when updating a missing board', async () => {
    await expect(service.updateBoard('missing', 'Sprint One')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('cannot get a board after deleting it', async () => {
    const board = await service.createBoard('Sprint 1');

    await service.deleteBoard(board.id);

    await expect(service.getBoard(board.id)).rejects.toBeInstanceOf(NotFoundError);
    await expect(service.listBoards()).resolves.toEqual([]);
  });
});
