declare global {
  namespace Express {
    interface Request {
      /** Set by the request logger, echoed as `x-request-id`. */
      id?: string;
      /** Rate limiting identity resolved from API key, X-Client-ID or IP. */
      clientId?: string;
    }
  }
}

export {};
