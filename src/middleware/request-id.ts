import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';

export const requestIdMiddleware = (req: Request, res: Response, next: NextFunction) => {
  // Reuse the caller's id when it sends one
  const incoming = req.get('x-request-id');
  req.id = incoming && incoming.trim() ? incoming.trim() : uuidv4();
  res.setHeader('x-request-id', req.id);
  next();
};
