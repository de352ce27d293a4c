import type { PasswordHasher } from '../../domain/auth/password.js';
import { normalizeEmail, User, UserStore } from '../../domain/auth/user.js';
import { InvalidInputError } from '../errors.js';
import type { TokenService } from './tokens.js';

export interface RegisterCommand {
  email: string;
  password: string;
}

export interface AuthResult {
  user: User;
  token: string;
}

export class RegisterUseCase {
  constructor(
    private userStore: UserStore,
    private passwordHasher: PasswordHasher,
    private tokens: TokenService
  ) {}

  async execute(command: RegisterCommand): Promise<AuthResult> {
    const email = normalizeEmail(command.email);
    if (email === '' || command.password === '') {
      throw new InvalidInputError('email and password required');
    }

    const passwordHash = await this.passwordHasher.hash(command.password);

    // AlreadyExistsError from the store propagates as-is
    const user = await this.userStore.create(email, passwordHash);

    return { user, token: this.tokens.issue(user) };
  }
}
