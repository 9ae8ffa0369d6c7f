import type { Request, Response, NextFunction } from 'express';

const CRAWLER_MARKER = 'bot';

export function requestLogger(req: Request, _res: Response, next: NextFunction) {
  console.log(`Incoming request: ${req.method} ${req.originalUrl} from ${req.ip}`);
  next();
}

/** Coarse anti-crawler gate: no User-Agent, or one that names a bot, never reaches a route. */
export function rejectSuspiciousAgents(req: Request, res: Response, next: NextFunction) {
  const agent = req.headers['user-agent'];
  if (!agent || agent.toLowerCase().includes(CRAWLER_MARKER)) {
    console.warn(`Blocked suspicious request from ${req.ip}`);
    return res.status(400).json({
      success: false,
      data: null,
      message: 'Invalid or suspicious request detected',
      code: 'BAD_REQUEST',
    });
  }
  next();
}
