import type { Response } from "express";
import { DuplicateEntityError, EntityNotFoundError, InvalidEntityError } from "../models/errors";
import { logger } from "../utils/logger";

export const sendError = (res: Response, error: unknown, fallback: string) => {
  if (error instanceof EntityNotFoundError) {
    res.status(404).json({ error: error.message });
    return;
  }
  if (error instanceof DuplicateEntityError) {
    res.status(409).json({ error: error.message });
    return;
  }
  if (error instanceof InvalidEntityError) {
    res.status(400).json({ error: error.message });
    return;
  }
  logger.error(fallback, { error });
  res.status(500).json({ error: error instanceof Error ? error.message : fallback });
};

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/** Accepts numbers and plain decimal strings; hex, exponents, padding and "" are `undefined`. */
export const toNumber = (value: unknown): number | undefined => {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === "string" && DECIMAL.test(value)) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
};

export const toInteger = (value: unknown): number | undefined => {
  const parsed = toNumber(value);
  return parsed !== undefined && Number.isInteger(parsed) ? parsed : undefined;
};
