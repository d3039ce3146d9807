import { Request, Response, NextFunction } from 'express';
import { SupabaseClient } from '@supabase/supabase-js';
import { logger } from '../utils/logger';

export interface EmployerIdentity {
  id: string;
  email?: string;
}

declare global {
  namespace Express {
    interface Request {
      employer?: EmployerIdentity;
    }
  }
}

const EMPLOYER_HEADER = 'x-employer-id';

/**
 * Resolve the calling employer. With Supabase configured the bearer token is
 * verified against Supabase Auth; otherwise the gateway-supplied
 * `x-employer-id` header is trusted.
 */
export const createAuthMiddleware = (supabase?: SupabaseClient) => {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (supabase) {
        const token = req.headers.authorization?.replace('Bearer ', '');
        if (!token) {
          return res.status(401).json({
            success: false,
            error: 'Authorization token required',
          });
        }

        const { data, error } = await supabase.auth.getUser(token);
        if (error || !data.user) {
          return res.status(401).json({
            success: false,
            error: 'Invalid or expired token',
          });
        }

        req.employer = { id: data.user.id, email: data.user.email };
        return next();
      }

      const employerId = req.header(EMPLOYER_HEADER)?.trim();
      if (!employerId) {
        return res.status(401).json({
          success: false,
          error: `Missing ${EMPLOYER_HEADER} header`,
        });
      }

      req.employer = { id: employerId };
      next();
    } catch (error) {
      logger.error('Authentication failed:', error);
      res.status(401).json({
        success: false,
        error: 'Authentication failed',
      });
    }
  };
};
