import type { UserStore } from '../domain/auth/user.js';
import type { BoardStore } from '../domain/board/board.js';
import type { AppConfig } from './config.js';
import type { SafeLogger } from './logger.js';
import { MemoryUserStore } from './memory/memoryUserStore.js';
import { MemoryBoardStore } from './memory/memoryBoardStore.js';
import { asQueryable, createPool } from './db/pool.js';
import { PgUserRepo } from './db/userRepo.js';
import { PgBoardRepo } from './db/boardRepo.js';

export interface Stores {
  userStore: UserStore;
  boardStore: BoardStore;
  /** Rejects when the backing store is unreachable. */
  healthCheck(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Picks the storage backend once at startup. Nothing above this point
 * knows which one is in use.
 */
export function createStores(store: AppConfig['store'], logger: SafeLogger): Stores {
  if (store.backend === 'memory') {
    logger.info({ backend: 'memory' }, 'Using in-memory stores; data is lost on restart');
    return {
      userStore: new MemoryUserStore(),
      boardStore: new MemoryBoardStore(),
      healthCheck: async () => {},
      close: async () => {},
    };
  }

  logger.info({ backend: 'postgres' }, 'Using PostgreSQL stores');
  const pool = createPool(store.databaseUrl, logger);
  const db = asQueryable(pool);
  return {
    userStore: new PgUserRepo(db),
    boardStore: new PgBoardRepo(db),
    healthCheck: async () => {
      await pool.query('SELECT 1');
    },
    close: async () => {
      await pool.end();
    },
  };
}
