import { z } from 'zod';

// ── Login credentials ───────────────────────────────────────
// Read from the environment only. Never logged, never written.

export const USERNAME_ENV = 'DANDI_USERNAME';
export const PASSWORD_ENV = 'DANDI_PASSWORD';

const credentialsSchema = z.object({
  [USERNAME_ENV]: z.string().min(1),
  [PASSWORD_ENV]: z.string().min(1),
});

export interface Credentials {
  readonly username: string;
  readonly password: string;
}

export class MissingCredentialsError extends Error {
  constructor() {
    super(`Login requires ${USERNAME_ENV} and ${PASSWORD_ENV} to be set`);
    this.name = 'MissingCredentialsError';
  }
}

export function loadCredentials(env: NodeJS.ProcessEnv): Credentials {
  const result = credentialsSchema.safeParse(env);
  if (!result.success) {
    throw new MissingCredentialsError();
  }
  return {
    username: result.data[USERNAME_ENV],
    password: result.data[PASSWORD_ENV],
  };
}
