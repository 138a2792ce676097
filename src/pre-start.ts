/**
 * Pre-start is where we load environment variables before anything reads
 * process.env.
 */

import path from 'path';
import dotenv from 'dotenv';

const result = dotenv.config({
  path: path.join(__dirname, '..', '.env'),
});

// A missing .env is fine; defaults apply
if (result.error && !('code' in result.error && result.error.code === 'ENOENT')) {
  throw result.error;
}
