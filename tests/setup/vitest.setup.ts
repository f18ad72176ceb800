import dotenv from 'dotenv';

import { setLogLevel } from '../../functions/_shared/utils/logger.ts';

const envPath = process.env.ENV_PATH || '.env.test';
dotenv.config({ path: envPath });

setLogLevel(process.env.LOG_LEVEL === 'debug' ? 'debug' : 'error');
