import { KdlError, type KdlErrorDetail } from "../../src/kdl/index.js";

/**
 * Run `fn` and return the detail of the KdlError it throws.
 */
export function catchKdlError(fn: () => unknown): KdlErrorDetail {
  try {
    fn();
  } catch (error) {
    if (error instanceof KdlError) return error.detail;
    throw error;
  }
  throw new Error("Expected a KdlError to be thrown");
}
