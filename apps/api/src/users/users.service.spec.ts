import { Test, TestingModule } from '@nestjs/testing';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ENTITIES } from '@almanac/database';
import { UsersModule } from './users.module';
import { UsersService } from './users.service';
import { PasswordHasherService } from './password-hasher.service';
import { UsernameTakenException } from './exceptions/username-taken.exception';

describe('UsersService', () => {
  let moduleRef: TestingModule;
  let usersService: UsersService;
  let passwordHasher: PasswordHasherService;

  beforeEach(async () => {
    moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          load: [() => ({ BCRYPT_SALT_ROUNDS: '4' })],
        }),
        TypeOrmModule.forRoot({
          type: 'better-sqlite3',
          database: ':memory:',
          entities: [...ENTITIES],
          synchronize: true,
        }),
        UsersModule,
      ],
    }).compile();

    usersService = moduleRef.get(UsersService);
    passwordHasher = moduleRef.get(PasswordHasherService);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('creates a user with a hashed password', async () => {
    const user = await usersService.create('editor', 'test-password');

    expect(user.username).toBe('editor');
    expect(user.passwordHash).not.toBe('test-password');
    await expect(
      passwordHasher.verify('test-password', user.passwordHash),
    ).resolves.toBe(true);
    await expect(usersService.findByUsername('editor')).resolves.toEqual(user);
  });

  it('refuses a taken username', async () => {
    await usersService.create('editor', 'test-password');

    await expect(
      usersService.create('editor', 'another-password'),
    ).rejects.toBeInstanceOf(UsernameTakenException);
  });

  it('returns null for an unknown username', async () => {
    await expect(usersService.findByUsername('nobody')).resolves.toBeNull();
  });

  describe('setPassword', () => {
    it('creates the user when missing', async () => {
      const { user, created } = await usersService.setPassword(
        'admin',
        'first-password',
      );

      expect(created).toBe(true);
      await expect(
        passwordHasher.verify('first-password', user.passwordHash),
      ).resolves.toBe(true);
    });

    it('replaces the password of an existing user', async () => {
      const original = await usersService.create('admin', 'old-password');

      const { user, created } = await usersService.setPassword(
        'admin',
        'new-password',
      );

      expect(created).toBe(false);
      expect(user.id).toBe(original.id);
      await expect(
        passwordHasher.verify('old-password', user.passwordHash),
      ).resolves.toBe(false);
      await expect(
        passwordHasher.verify('new-password', user.passwordHash),
      ).resolves.toBe(true);
    });
  });
});
