/**
 * Authentication middleware for operator JWT bearer tokens
 */

import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';

export interface AuthenticatedRequest extends Request {
  operator?: {
    id: string;
    email?: string;
  };
}

/**
 * Middleware to authenticate JWT tokens. The token subject identifies the operator.
 */
export function authenticateToken(jwtSecret: string) {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    const authHeader = req.headers['authorization'];
    const token = authHeader && authHeader.split(' ')[1]; // Bearer TOKEN

    if (!token) {
      res.status(401).json({
        error: 'Access token required',
        message: 'Please provide a valid access token'
      });
      return;
    }

    try {
      const decoded = jwt.verify(token, jwtSecret);
      if (typeof decoded === 'string' || typeof decoded.sub !== 'string') {
        res.status(403).json({
          error: 'Invalid token',
          message: 'Access token has no subject'
        });
        return;
      }

      req.operator = {
        id: decoded.sub,
        email: typeof decoded.email === 'string' ? decoded.email : undefined
      };
      next();
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        res.status(401).json({
          error: 'Token expired',
          message: 'Access token has expired'
        });
      } else if (error instanceof jwt.JsonWebTokenError) {
        res.status(403).json({
          error: 'Invalid token',
          message: 'Access token is invalid'
        });
      } else {
        res.status(500).json({
          error: 'Authentication error',
          message: 'Unable to authenticate token'
        });
      }
    }
  };
}
