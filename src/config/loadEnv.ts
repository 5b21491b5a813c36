import dotenv from 'dotenv';

/**
 * Loads `.env` from the working directory (or `DOTENV_CONFIG_PATH`). Variables already present in
 * the environment win over the file.
 */
export function loadEnvFile(): void {
  dotenv.config({ path: process.env.DOTENV_CONFIG_PATH || undefined });
}
