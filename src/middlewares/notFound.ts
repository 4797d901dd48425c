import { Request, Response } from 'express';

/**
 * 404 handler for routes nothing else matched
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    success: false,
    error: {
      message: `Route ${req.method} ${req.path} not found`,
    },
  });
}
