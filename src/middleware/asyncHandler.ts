import { NextFunction, Request, Response } from 'express';

// Express 4 does not forward rejected promises to the error middleware
export function asyncHandler<R extends Request>(
  fn: (req: R, res: Response, next: NextFunction) => Promise<unknown>,
): (req: R, res: Response, next: NextFunction) => void {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}
