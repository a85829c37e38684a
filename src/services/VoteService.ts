/**
 * Idea votes. A vote is toggled: voting twice removes it.
 * The idea's vote count is recomputed from the vote table after every toggle,
 * so concurrent toggles settle on the true count.
 */

import type { IIdeaRepository } from '../repositories/IIdeaRepository.js';
import type { IVoteRepository } from '../repositories/IVoteRepository.js';
import type { VoteStatusResponse, VoteToggleResponse } from '../types/api.js';
import { NotFoundError } from '../errors.js';

export class VoteService {
  constructor(
    private readonly voteRepo: IVoteRepository,
    private readonly ideaRepo: IIdeaRepository
  ) {}

  async toggle(ideaId: string, userId: string): Promise<VoteToggleResponse> {
    await this.requireIdea(ideaId);

    const existing = await this.voteRepo.find(ideaId, userId);
    let action: VoteToggleResponse['action'];

    if (existing) {
      await this.voteRepo.delete(ideaId, userId);
      action = 'removed';
    } else {
      await this.voteRepo.insert(ideaId, userId);
      action = 'added';
    }

    const voteCount = await this.voteRepo.countByIdea(ideaId);
    await this.ideaRepo.update(ideaId, { vote_count: voteCount });

    return { action, voteCount };
  }

  async status(ideaId: string, userId: string): Promise<VoteStatusResponse> {
    await this.requireIdea(ideaId);

    const [vote, voteCount] = await Promise.all([
      this.voteRepo.find(ideaId, userId),
      this.voteRepo.countByIdea(ideaId),
    ]);

    return { hasVoted: vote !== null, voteCount };
  }

  private async requireIdea(ideaId: string): Promise<void> {
    const idea = await this.ideaRepo.findById(ideaId);
    if (!idea) {
      throw new NotFoundError(`Idea "${ideaId}" not found`);
    }
  }
}
