import { Password } from '../../domain/auth/password.js';
import type { User, UserRepository } from '../../domain/auth/user.js';
import { ConflictError } from '../errors.js';

export interface RegisterCommand {
  email: string;
  username: string;
  password: string;
}

export class RegisterUseCase {
  constructor(private userRepo: UserRepository) {}

  async execute(command: RegisterCommand): Promise<User> {
    // Email is checked before username
    const existingEmail = await this.userRepo.findByEmail(command.email);
    if (existingEmail) {
      throw new ConflictError('Email already registered');
    }

    const existingUsername = await this.userRepo.findByUsername(command.username);
    if (existingUsername) {
      throw new ConflictError('Username already taken');
    }

    const passwordHash = await Password.hash(command.password);

    return this.userRepo.create({
      email: command.email,
      username: command.username,
      passwordHash,
    });
  }
}
