import { describe, it, expect } from "vitest";
import { ERROR_CODES, PanelKitError, ValidationError } from "../src/errors";
import { Viewport } from "../src/core/Viewport";

describe("errors", () => {
  it("should only define codes that are raised", () => {
    expect(Object.values(ERROR_CODES)).toEqual(["VALIDATION_ERROR"]);
  });

  it("should prefix validation messages with the field", () => {
    const error = new ValidationError("must be positive, got 0", "viewport.zoom", 0);
    expect(error).toBeInstanceOf(PanelKitError);
    expect(error.message).toBe("viewport.zoom: must be positive, got 0");
    expect(error.name).toBe("ValidationError");
    expect(error.context).toEqual({ field: "viewport.zoom" });
  });

  it("should raise viewport failures as validation errors", () => {
    let caught: unknown;
    try {
      new Viewport(800, 600, 0);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    if (caught instanceof ValidationError) {
      expect(caught.code).toBe(ERROR_CODES.VALIDATION_ERROR);
      expect(caught.field).toBe("viewport.zoom");
    }
  });
});
