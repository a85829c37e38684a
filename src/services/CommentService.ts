/**
 * Comments on ideas. Append-only; authors are resolved for display.
 */

import type { ICommentRepository } from '../repositories/ICommentRepository.js';
import type { IIdeaRepository } from '../repositories/IIdeaRepository.js';
import type { IUserRepository } from '../repositories/IUserRepository.js';
import type { CommentRow } from '../types/database.js';
import type { CommentResponse } from '../types/api.js';
import type { User } from '../types/models.js';
import { ContentScanner } from './ContentScanner.js';
import { NotFoundError, ValidationError } from '../errors.js';

export const COMMENT_MIN = 3;
export const COMMENT_MAX = 1000;

export class CommentService {
  private readonly scanner = new ContentScanner();

  constructor(
    private readonly commentRepo: ICommentRepository,
    private readonly ideaRepo: IIdeaRepository,
    private readonly userRepo: IUserRepository
  ) {}

  async add(ideaId: string, content: string, author: User): Promise<CommentResponse> {
    const text = content.trim();
    if (text.length < COMMENT_MIN || text.length > COMMENT_MAX) {
      throw new ValidationError(`content must be ${COMMENT_MIN}-${COMMENT_MAX} characters`);
    }

    const scan = this.scanner.scan({ content: text });
    if (scan.flagged) {
      throw new ValidationError('Comment was flagged by the content scanner', {
        reasons: scan.reasons,
      });
    }

    await this.requireIdea(ideaId);

    const row = await this.commentRepo.insert({
      idea_id: ideaId,
      author_id: author.id,
      content: text,
    });

    return rowToCommentResponse(row, author.name);
  }

  async list(ideaId: string): Promise<CommentResponse[]> {
    await this.requireIdea(ideaId);

    const rows = await this.commentRepo.listByIdea(ideaId);
    const authorIds = [...new Set(rows.map((r) => r.author_id))];
    const authors = await this.userRepo.findByIds(authorIds);
    const names = new Map(authors.map((a) => [a.id, a.name]));

    return rows.map((row) => rowToCommentResponse(row, names.get(row.author_id) ?? null));
  }

  private async requireIdea(ideaId: string): Promise<void> {
    const idea = await this.ideaRepo.findById(ideaId);
    if (!idea) {
      throw new NotFoundError(`Idea "${ideaId}" not found`);
    }
  }
}

function rowToCommentResponse(row: CommentRow, authorName: string | null): CommentResponse {
  return {
    id: row.id,
    ideaId: row.idea_id,
    authorId: row.author_id,
    authorName,
    content: row.content,
    createdAt: row.created_at,
  };
}
