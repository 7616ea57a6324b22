/**
 * Validation Middleware
 * 
 * Provides Zod-based request validation for body and params.
 * Integrates with existing error handling via ValidationError.
 */

import { Request, Response, NextFunction, RequestHandler } from "express";
import { z, ZodSchema, ZodError } from "zod";
import { ValidationError } from "../utils/errorHandler";

export interface ValidationSchemas {
  body?: ZodSchema;
  params?: ZodSchema;
}

/**
 * Creates a validation middleware that validates request parts against Zod schemas.
 * 
 * @example
 * app.post("/api/capabilities/:name",
 *   validate({ params: commonSchemas.capabilityName }),
 *   async (req, res) => { ... }
 * );
 */
export function validate(schemas: ValidationSchemas): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    try {
      if (schemas.params) {
        req.params = schemas.params.parse(req.params);
      }
      if (schemas.body) {
        req.body = schemas.body.parse(req.body);
      }
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        const messages = error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join(', ');
        next(new ValidationError(messages));
      } else {
        next(error);
      }
    }
  };
}

// Common parameter schemas
export const commonSchemas = {
  capabilityName: z.object({
    name: z.string().regex(/^[a-z][a-z_]*$/, "Capability names are lower_snake_case"),
  }),
  // Capability input is validated by the capability itself; only the envelope is checked here.
  capabilityInput: z.record(z.unknown()).default({}),
};
