import type { ApiClientKey } from '@config/env.config';

declare global {
  namespace Express {
    interface Request {
      /** Set by the API key middleware once the caller is authenticated. */
      apiClient?: ApiClientKey;
    }
  }
}

export {};
