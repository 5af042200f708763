import { UserRepo, isUniqueViolation } from "../storage/index.js";
import { DuplicateUserError } from "../errors/index.js";
import { parseUserInput } from "../validation/index.js";
import type { User } from "../types/index.js";

export class UserService {
  private userRepo: UserRepo;

  constructor(userRepo: UserRepo) {
    this.userRepo = userRepo;
  }

  async listUsers(): Promise<User[]> {
    return this.userRepo.findAll();
  }

  /**
   * Register a user. Username and email are trimmed and must not already be
   * taken by anyone (exact, case-sensitive match).
   */
  async createUser(input: unknown): Promise<User> {
    const { username, email } = parseUserInput(input);

    if (await this.userRepo.findByUsernameOrEmail(username, email)) {
      throw new DuplicateUserError();
    }

    try {
      return await this.userRepo.create({ username, email });
    } catch (error) {
      // Lost a race with a concurrent registration
      if (isUniqueViolation(error)) {
        throw new DuplicateUserError();
      }
      throw error;
    }
  }
}
