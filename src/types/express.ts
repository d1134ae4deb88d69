import { Caller } from './auth';

declare global {
  namespace Express {
    interface Request {
      caller?: Caller;
      requestId?: string;
    }
  }
}

export {};
