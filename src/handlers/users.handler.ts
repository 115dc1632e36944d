import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { User, UsersRepository } from '../db/repositories/users.repository.js';
import { addLogContext, type RequestContext } from '../pipeline/context.js';
import { requireRole, toIdentityResponse } from '../pipeline/identity.js';
import { json, type PipelineRequest, type PipelineResponse } from '../pipeline/types.js';
import { BusinessError, Errors } from '../utils/errors.js';

export const createUserSchema = z.object({
  email: z.string().email(),
  name: z.string().trim().min(1).max(100),
});

export interface UserResponse {
  id: string;
  email: string;
  name: string;
  createdBy: string | null;
  createdAt: string;
}

export class UsersHandler {
  constructor(private readonly usersRepo: UsersRepository) {}

  private toResponse(user: User): UserResponse {
    return {
      id: user.id,
      email: user.email,
      name: user.name,
      createdBy: user.createdBy,
      createdAt: user.createdAt.toISOString(),
    };
  }

  async getMe(_request: PipelineRequest, context: RequestContext): Promise<PipelineResponse> {
    return json(toIdentityResponse(context.identity));
  }

  async getUser(request: PipelineRequest): Promise<PipelineResponse> {
    const id = request.params?.id ?? '';

    const user = await this.usersRepo.findById(id);
    if (!user) {
      throw Errors.notFound('User');
    }

    return json(this.toResponse(user));
  }

  async createUser(request: PipelineRequest, context: RequestContext): Promise<PipelineResponse> {
    const input = createUserSchema.parse(request.body ?? {});

    const existing = await this.usersRepo.findByEmail(input.email);
    if (existing) {
      throw new BusinessError('A user with this email already exists', { field: 'email' }, 409);
    }

    const user = await this.usersRepo.create({
      id: randomUUID(),
      email: input.email,
      name: input.name,
      createdBy: context.identity.subject,
      createdAt: new Date(),
    });
    addLogContext(context, { created_user_id: user.id });

    return json(this.toResponse(user), 201);
  }

  async deleteUser(request: PipelineRequest, context: RequestContext): Promise<PipelineResponse> {
    requireRole(context.identity, 'admin');
    const id = request.params?.id ?? '';

    const deleted = await this.usersRepo.delete(id);
    if (!deleted) {
      throw Errors.notFound('User');
    }

    return { statusCode: 204 };
  }
}
