/**
 * Security Middleware
 * 
 * Security headers for the JSON API. The server serves no pages, so the
 * content security policy denies everything.
 */

import { Request, Response, NextFunction } from 'express';

export function addSecurityHeaders(_req: Request, res: Response, next: NextFunction) {
    // Prevent clickjacking
    res.setHeader('X-Frame-Options', 'DENY');

    // Prevent MIME type sniffing
    res.setHeader('X-Content-Type-Options', 'nosniff');

    res.setHeader('Referrer-Policy', 'no-referrer');
    res.setHeader('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");

    next();
}
