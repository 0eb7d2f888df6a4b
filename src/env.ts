// Loads .env from the working directory. The entry point imports this before
// anything else, since the logger and Sentry read process.env on import.
import * as dotenv from 'dotenv';
import * as path from 'node:path';

dotenv.config({ path: path.resolve(process.cwd(), '.env') });
