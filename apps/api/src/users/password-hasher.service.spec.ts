import { ConfigService } from '@nestjs/config';
import { PasswordHasherService } from './password-hasher.service';

describe('PasswordHasherService', () => {
  const hasher = new PasswordHasherService(
    new ConfigService({ BCRYPT_SALT_ROUNDS: '4' }),
  );

  it('verifies a password against its own hash', async () => {
    const passwordHash = await hasher.hash('correct horse');

    await expect(hasher.verify('correct horse', passwordHash)).resolves.toBe(
      true,
    );
  });

  it('rejects a different password', async () => {
    const passwordHash = await hasher.hash('correct horse');

    await expect(hasher.verify('battery staple', passwordHash)).resolves.toBe(
      false,
    );
  });

  it('salts every hash', async () => {
    const first = await hasher.hash('same-password');
    const second = await hasher.hash('same-password');

    expect(first).not.toBe(second);
    await expect(hasher.verify('same-password', first)).resolves.toBe(true);
    await expect(hasher.verify('same-password', second)).resolves.toBe(true);
  });

  it('uses the configured cost factor', async () => {
    const passwordHash = await hasher.hash('pw');

    expect(passwordHash.startsWith('$2b$04$')).toBe(true);
  });

  it('treats a malformed hash as a mismatch', async () => {
    await expect(hasher.verify('anything', 'not-a-bcrypt-hash')).resolves.toBe(
      false,
    );
  });
});
