import { describe, it, expect } from "vitest";
import {
  ConflictError,
  ReferentialIntegrityError,
  pgErrorCode,
  translateDatabaseError,
} from "../../src/utils/errors";

const pgError = (code: string, message: string) => Object.assign(new Error(message), { code });

describe("translateDatabaseError", () => {
  it("turns deadlocks into a retryable conflict", () => {
    const translated = translateDatabaseError(pgError("40P01", "deadlock detected"));
    expect(translated).toBeInstanceOf(ConflictError);
    expect(translated).toMatchObject({
      statusCode: 409,
      conflictType: "concurrent_update",
      message: "Transaction aborted by a concurrent update, retry the request: deadlock detected",
    });
  });

  it("turns serialization failures into a retryable conflict", () => {
    const translated = translateDatabaseError(
      pgError("40001", "could not serialize access due to concurrent update")
    );
    expect(translated).toBeInstanceOf(ConflictError);
    expect(translated).toMatchObject({ conflictType: "concurrent_update" });
  });

  it("maps constraint violations", () => {
    expect(translateDatabaseError(pgError("23503", "fk"))).toBeInstanceOf(ReferentialIntegrityError);
    expect(translateDatabaseError(pgError("23505", "dup"))).toMatchObject({ conflictType: "unique" });
    expect(translateDatabaseError(pgError("23514", "check"))).toMatchObject({ conflictType: "check" });
  });

  it("returns anything else untouched", () => {
    const error = pgError("08006", "connection failure");
    expect(translateDatabaseError(error)).toBe(error);
    expect(pgErrorCode(new Error("plain"))).toBeUndefined();
  });
});
