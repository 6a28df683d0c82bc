/**
 * Config path resolution.
 *
 * Resolution modes (in priority order):
 *   1. GH_TOOLS_CONFIG_DIR env var → `<dir>/.env`
 *   2. Working directory          → `./.env`
 *
 * MUST be imported before any other module that reads process.env.
 * Calls dotenv.config() so config.ts does not need to.
 */

import path from 'path';
import dotenv from 'dotenv';

const configDir = process.env.GH_TOOLS_CONFIG_DIR;

export const ENV_FILE = configDir ? path.join(configDir, '.env') : path.join(process.cwd(), '.env');

// Load environment variables from the resolved .env file (missing file is fine)
dotenv.config({ path: ENV_FILE });
