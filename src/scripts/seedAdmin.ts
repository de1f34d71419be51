import dotenv from 'dotenv';
import { z } from 'zod';
import { Password } from '../domain/auth/password.js';
import { normalizeEmail } from '../domain/auth/user.js';
import { PgUserRepo } from '../infra/db/userRepo.js';
import { pool } from '../infra/db/pool.js';

dotenv.config();

const seedEnvSchema = z.object({
  ADMIN_EMAIL: z.string().email(),
  ADMIN_USERNAME: z.string().min(1).default('admin'),
  ADMIN_PASSWORD: z.string().min(8),
});

/**
 * Create the first admin account. Existing accounts are left untouched,
 * including their role.
 */
export async function seedAdmin(env: NodeJS.ProcessEnv = process.env): Promise<void> {
  const { ADMIN_EMAIL, ADMIN_USERNAME, ADMIN_PASSWORD } = seedEnvSchema.parse(env);
  const users = new PgUserRepo();
  const email = normalizeEmail(ADMIN_EMAIL);

  const existing = await users.findByEmail(email);
  if (existing) {
    console.log(`User ${email} already exists (role: ${existing.role}); nothing to do.`);
    return;
  }

  const admin = await users.create({
    username: ADMIN_USERNAME,
    email,
    passwordHash: await Password.hash(ADMIN_PASSWORD),
    role: 'admin',
  });
  console.log(`✓ Created admin ${admin.email} (${admin.id})`);
}

// Run if called directly
if (process.argv[1]?.endsWith('seedAdmin.ts') || process.argv[1]?.endsWith('seedAdmin.js')) {
  void seedAdmin()
    .catch((error) => {
      console.error('Seeding admin failed:', error);
      process.exitCode = 1;
    })
    .finally(() => pool.end());
}
