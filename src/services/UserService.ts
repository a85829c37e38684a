/**
 * User registration and API-key authentication.
 */

import { createHash, randomBytes } from 'node:crypto';
import type { IUserRepository } from '../repositories/IUserRepository.js';
import type { IVoteRepository } from '../repositories/IVoteRepository.js';
import type { User } from '../types/models.js';
import type { UserRow } from '../types/database.js';
import type {
  CreateUserRequest,
  CreateUserResponse,
  MyVotesResponse,
  UserResponse,
} from '../types/api.js';
import {
  ConflictError,
  NotFoundError,
  UnauthorizedError,
  ValidationError,
} from '../errors.js';

const API_KEY_PREFIX = 'ih_key_';
const MAX_NAME_LENGTH = 100;
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export class UserService {
  private readonly adminEmails: Set<string>;

  constructor(
    private readonly userRepo: IUserRepository,
    private readonly voteRepo: IVoteRepository,
    adminEmails: string[] = []
  ) {
    this.adminEmails = new Set(adminEmails.map((e) => e.toLowerCase()));
  }

  async register(input: CreateUserRequest): Promise<CreateUserResponse> {
    const name = input.name.trim();
    const email = input.email.trim().toLowerCase();

    if (name.length === 0 || name.length > MAX_NAME_LENGTH) {
      throw new ValidationError(`name must be 1-${MAX_NAME_LENGTH} characters`);
    }
    if (!EMAIL_PATTERN.test(email)) {
      throw new ValidationError('email must be a valid email address');
    }

    const existing = await this.userRepo.findByEmail(email);
    if (existing) {
      throw new ConflictError(`A user with email "${email}" already exists`);
    }

    const apiKey = generateApiKey();
    const row = await this.userRepo.insert({
      name,
      email,
      department: input.department?.trim() || null,
      role: this.adminEmails.has(email) ? 'admin' : 'member',
      api_key_hash: hashApiKey(apiKey),
    });

    return { ...toUserResponse(rowToUser(row)), apiKey };
  }

  async authenticate(apiKey: string): Promise<User> {
    if (!apiKey) {
      throw new UnauthorizedError();
    }

    const row = await this.userRepo.findByApiKeyHash(hashApiKey(apiKey));
    if (!row) {
      throw new UnauthorizedError('Invalid API key');
    }

    return rowToUser(row);
  }

  async getById(id: string): Promise<UserResponse> {
    const row = await this.userRepo.findById(id);
    if (!row) {
      throw new NotFoundError(`User "${id}" not found`);
    }
    return toUserResponse(rowToUser(row));
  }

  /** Idea ids the user has voted for. */
  async getVotes(userId: string): Promise<MyVotesResponse> {
    return { ideaIds: await this.voteRepo.listIdeaIdsByUser(userId) };
  }
}

// ── Helpers ──

function generateApiKey(): string {
  return `${API_KEY_PREFIX}${randomBytes(32).toString('base64url')}`;
}

// SHA-256 keeps lookup-by-hash possible; keys are 256 random bits.
export function hashApiKey(apiKey: string): string {
  return createHash('sha256').update(apiKey).digest('hex');
}

export function rowToUser(row: UserRow): User {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    department: row.department,
    role: row.role,
    createdAt: new Date(row.created_at),
  };
}

export function toUserResponse(user: User): UserResponse {
  return {
    id: user.id,
    name: user.name,
    email: user.email,
    department: user.department,
    role: user.role,
    createdAt: user.createdAt.toISOString(),
  };
}
