import { Request, Response, NextFunction } from "express";
import { parseAmount } from "../utils/bps";

/** "amount" accepts a non-negative integer as a decimal string or safe number. */
type FieldType = "string" | "amount" | "enum";

interface FieldSpec {
  name: string;
  type: FieldType;
  /** Allowed values for "enum" fields. */
  values?: readonly string[];
}

const fail = (res: Response, message: string) => {
  res.status(400).json({ success: false, message, code: "VALIDATION_ERROR" });
};

export const validateFields =
  (fields: FieldSpec[]) =>
  (req: Request, res: Response, next: NextFunction): void => {
    const body: Record<string, unknown> = typeof req.body === "object" && req.body !== null ? req.body : {};
    for (const field of fields) {
      const value = body[field.name];
      if (value === undefined || value === null) {
        fail(res, `Missing required field: ${field.name}`);
        return;
      }
      if (field.type === "string" && (typeof value !== "string" || value.trim() === "")) {
        fail(res, `Invalid type for field ${field.name}: expected string`);
        return;
      }
      if (field.type === "amount" && parseAmount(value) === null) {
        fail(res, `Invalid value for field ${field.name}: expected a non-negative integer`);
        return;
      }
      if (field.type === "enum" && !(field.values ?? []).some((allowed) => allowed === value)) {
        fail(res, `Invalid value for field ${field.name}: expected one of ${(field.values ?? []).join(", ")}`);
        return;
      }
    }
    next();
  };
