import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { User } from '@almanac/database';
import { PasswordHasherService } from './password-hasher.service';
import { UsernameTakenException } from './exceptions/username-taken.exception';

export interface SetPasswordResult {
  user: User;
  /** True when the user did not exist and was created */
  created: boolean;
}

/**
 * UsersService — user lookup and credential management.
 *
 * Password hashes never leave this service except inside the User entity,
 * which controllers never serialize.
 */
@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    @InjectRepository(User)
    private readonly userRepository: Repository<User>,
    private readonly passwordHasher: PasswordHasherService,
  ) {}

  findByUsername(username: string): Promise<User | null> {
    return this.userRepository.findOne({ where: { username } });
  }

  /**
   * Create a user with a freshly hashed password.
   *
   * @throws UsernameTakenException if the username is already taken
   */
  async create(username: string, password: string): Promise<User> {
    const existingUser = await this.userRepository.findOne({
      where: { username },
      select: ['id'],
    });

    if (existingUser) {
      throw new UsernameTakenException(username);
    }

    const passwordHash = await this.passwordHasher.hash(password);
    const savedUser = await this.userRepository.save(
      this.userRepository.create({ username, passwordHash }),
    );

    this.logger.log(`User created: ${savedUser.id} (${savedUser.username})`);

    return savedUser;
  }

  /**
   * Set the password of a user, creating the user when it does not exist.
   */
  async setPassword(
    username: string,
    password: string,
  ): Promise<SetPasswordResult> {
    const user = await this.findByUsername(username);

    if (!user) {
      return { user: await this.create(username, password), created: true };
    }

    user.passwordHash = await this.passwordHasher.hash(password);
    const savedUser = await this.userRepository.save(user);

    this.logger.log(`Password updated for user ${savedUser.username}`);

    return { user: savedUser, created: false };
  }
}
