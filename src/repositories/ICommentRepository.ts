/**
 * Comment data access interface. Comments are append-only.
 */

import type { CommentRow } from '../types/database.js';

export interface ICommentRepository {
  insert(row: Omit<CommentRow, 'id' | 'created_at'>): Promise<CommentRow>;

  /** Oldest first. */
  listByIdea(ideaId: string): Promise<CommentRow[]>;
}
