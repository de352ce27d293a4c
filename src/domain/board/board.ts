export interface Board {
  readonly id: string;
  readonly title: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

/**
 * Board persistence port. Title validation happens in BoardService;
 * stores accept whatever title they are given.
 */
export interface BoardStore {
  /** Newest first (createdAt descending). */
  list(): Promise<Board[]>;
  get(id: string): Promise<Board>;
  create(title: string): Promise<Board>;
  update(id: string, title: string): Promise<Board>;
  delete(id: string): Promise<void>;
}
