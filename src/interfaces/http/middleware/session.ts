/**
 * Cookie Session & Flash Messages
 * Layer: Interfaces (HTTP)
 *
 * The HTML flow answers every write with a redirect, so the status message
 * ("Bank created successfully!", "name is required") has to survive one extra
 * request. It is queued in a cookie-session signed with SECRET_KEY and read
 * back, once, by the next page that renders.
 *
 *   req.flash('success', 'Bank created successfully!');   // before redirect
 *   const flashes = req.consumeFlash();                   // while rendering
 *
 * The session is client-side, so the queue is parsed with Zod on the way in;
 * anything malformed is dropped.
 */
import { config } from '@core/config';
import cookieSession from 'cookie-session';
import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod/v4';

const flashMessageSchema = z.object({
  category: z.enum(['success', 'error']),
  message: z.string(),
});

export type FlashMessage = z.infer<typeof flashMessageSchema>;
export type FlashCategory = FlashMessage['category'];

declare global {
  namespace Express {
    interface Request {
      /** Queue a message for the next rendered page. Set by the flash middleware. */
      flash(category: FlashCategory, message: string): void;
      /** Return and clear every queued message. */
      consumeFlash(): FlashMessage[];
    }
  }
}

export const session = cookieSession({
  name: 'session',
  keys: [config.session.secret],
  httpOnly: true,
  sameSite: 'lax',
});

function readQueue(req: Request): FlashMessage[] {
  const parsed = z.array(flashMessageSchema).safeParse(req.session?.flash);
  return parsed.success ? parsed.data : [];
}

export function flash(req: Request, _res: Response, next: NextFunction): void {
  req.flash = (category, message) => {
    if (!req.session) {
      throw new Error('flash() needs the session middleware to run first');
    }
    req.session.flash = [...readQueue(req), { category, message }];
  };

  req.consumeFlash = () => {
    const messages = readQueue(req);
    if (req.session && req.session.flash !== undefined) {
      delete req.session.flash;
    }
    return messages;
  };

  next();
}
