/**
 * Loads .env.local from the working directory into process.env, without overriding variables
 * already set. Imported first by every module that reads the environment at load time
 * (config and the logger), so LOG_LEVEL and LOG_FILE from the file apply too.
 */

import * as path from "path";
import { config as loadEnv } from "dotenv";

export const ENV_FILE = path.resolve(process.cwd(), ".env.local");

loadEnv({ path: ENV_FILE });
