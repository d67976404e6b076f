import { isDevelopment } from '../config/app.js';
import { errorMessage } from '../utils/logger.js';

export function internalError(error: unknown) {
  // details stay server-side outside development
  return { error: 'Internal server error', message: isDevelopment ? errorMessage(error) : 'An unexpected error occurred' };
}
