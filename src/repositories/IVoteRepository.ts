/**
 * Vote data access interface. One vote per (idea, user).
 */

import type { VoteRow } from '../types/database.js';

export interface IVoteRepository {
  find(ideaId: string, userId: string): Promise<VoteRow | null>;

  insert(ideaId: string, userId: string): Promise<VoteRow>;

  delete(ideaId: string, userId: string): Promise<void>;

  countByIdea(ideaId: string): Promise<number>;

  /** Idea ids the user has voted for, newest vote first. */
  listIdeaIdsByUser(userId: string): Promise<string[]>;
}
