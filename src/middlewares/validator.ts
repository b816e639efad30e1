import { validate, type ValidationError as ClassValidationError } from "class-validator";
import { plainToInstance, type ClassConstructor } from "class-transformer";
import type { Request, Response, NextFunction } from "express";
import { ValidationError } from "../errors/app-error";

type Source = "body" | "query" | "params";

function describe(errors: ClassValidationError[]): string {
  const reasons = errors.flatMap((err) => Object.values(err.constraints ?? {}));
  return reasons.length ? `Validation failed: ${reasons.join(", ")}` : "Validation failed";
}

/**
 * DTO validation middlewares. The validated instance is kept on
 * `res.locals[source]`; read it back with `Validator.get`.
 */
export class Validator {
  static body<T extends object>(Schema: ClassConstructor<T>) {
    return Validator.of("body", Schema);
  }

  static query<T extends object>(Schema: ClassConstructor<T>) {
    return Validator.of("query", Schema);
  }

  static params<T extends object>(Schema: ClassConstructor<T>) {
    return Validator.of("params", Schema);
  }

  static get<T extends object>(res: Response, source: Source, Schema: ClassConstructor<T>): T {
    const value: unknown = res.locals[source];
    if (!(value instanceof Schema)) {
      throw new Error(`No validated ${source} of type ${Schema.name} on this request`);
    }
    return value;
  }

  private static of<T extends object>(source: Source, Schema: ClassConstructor<T>) {
    return (req: Request, res: Response, next: NextFunction) => {
      const input: unknown = req[source] ?? {};
      const instance = plainToInstance(Schema, input);

      validate(instance, { whitelist: true, forbidNonWhitelisted: true })
        .then((errors) => {
          if (errors.length) {
            return next(new ValidationError(describe(errors)));
          }
          res.locals[source] = instance;
          next();
        })
        .catch(next);
    };
  }
}
