import { Password } from '../../domain/auth/password.js';
import type { User, UserRepository } from '../../domain/auth/user.js';
import { UnauthorizedError } from '../errors.js';
import type { TokenService } from './tokenService.js';

export interface LoginCommand {
  email: string;
  password: string;
}

export interface LoginResult {
  accessToken: string;
  tokenType: 'bearer';
}

export const INVALID_CREDENTIALS_MESSAGE = 'Incorrect email or password';

export class LoginUseCase {
  constructor(
    private userRepo: UserRepository,
    private tokens: TokenService
  ) {}

  /**
   * Resolve a user from credentials. Unknown email, wrong password and an
   * inactive account all give null.
   */
  async authenticate(email: string, password: string): Promise<User | null> {
    const user = await this.userRepo.findByEmail(email);
    if (!user) {
      return null;
    }

    const isValid = await Password.verify(password, user.passwordHash);
    if (!isValid || !user.isActive) {
      return null;
    }

    return user;
  }

  async execute(command: LoginCommand): Promise<LoginResult> {
    const user = await this.authenticate(command.email, command.password);
    if (!user) {
      throw new UnauthorizedError(INVALID_CREDENTIALS_MESSAGE);
    }

    return {
      accessToken: this.tokens.issue({ userId: user.id, email: user.email }),
      tokenType: 'bearer',
    };
  }
}
