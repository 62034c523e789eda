import 'dotenv/config';
import pg from 'pg';
import { createPool } from '../infra/db/pool.js';
import { PgUserRepo } from '../infra/db/userRepo.js';
import { UserRepository } from '../application/users/userRepository.js';
import { CreateUserUseCase, CreateUserCommand } from '../application/users/createUser.js';
import { loadDatabaseUrl } from '../config.js';
import { createLogger } from '../lib/logger.js';

const log = createLogger('seed');

export const SAMPLE_USERS: CreateUserCommand[] = [
  { name: 'John Doe', email: 'john@example.com', age: 30, password: 'password123' },
  { name: 'Jane Smith', email: 'jane@example.com', age: 25, password: 'password456' },
  { name: 'Bob Johnson', email: 'bob@example.com', age: 35, password: 'password789' },
];

/**
 * Insert the sample users whose email is not taken yet.
 * Returns how many were created.
 */
export async function seedUsers(
  userRepo: UserRepository,
  users: CreateUserCommand[] = SAMPLE_USERS
): Promise<number> {
  const createUser = new CreateUserUseCase(userRepo);
  let created = 0;

  for (const user of users) {
    if (await userRepo.findByEmail(user.email)) {
      log.info({ email: user.email }, 'Sample user already exists, skipping');
      continue;
    }
    await createUser.execute(user, { kind: 'seed' });
    created++;
  }

  return created;
}

async function main(pool: pg.Pool): Promise<void> {
  try {
    const created = await seedUsers(new PgUserRepo(pool));
    log.info({ created }, 'Sample users created');
  } finally {
    await pool.end();
  }
}

// Run if called directly
if (process.argv[1]?.endsWith('seedUsers.ts') || process.argv[1]?.endsWith('seedUsers.js')) {
  main(createPool(loadDatabaseUrl()))
    .then(() => {
      process.exit(0);
    })
    .catch((error: unknown) => {
      log.fatal({ err: error }, 'Seeding failed');
      process.exit(1);
    });
}
