import 'dotenv/config';
import { ConfigError } from '../utils/errors.js';
import { parseEnv, type Env } from './envSchema.js';

let env: Env;
try {
    env = parseEnv(process.env);
} catch (err) {
    if (err instanceof ConfigError) {
        console.error(err.message);
        process.exit(1);
    }
    throw err;
}

export { env };
export type { Env };
