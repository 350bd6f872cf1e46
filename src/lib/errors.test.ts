import { describe, it, expect } from "vitest"
import {
  AppError,
  ValidationError,
  NotFoundError,
  InternalError,
  BackendUnavailableError,
  VectorStoreError,
  EmbeddingFailedError,
  ConfigError,
  isAppError,
  toAppError,
  errorMessage,
} from "./errors"

describe("Error Classes", () => {
  describe("AppError", () => {
    it("creates error with all properties", () => {
      const error = new AppError("VALIDATION_ERROR", "Something went wrong", 400, [
        { field: "userId", message: "Invalid" },
      ])

      expect(error.code).toBe("VALIDATION_ERROR")
      expect(error.message).toBe("Something went wrong")
      expect(error.statusCode).toBe(400)
      expect(error.details).toEqual([{ field: "userId", message: "Invalid" }])
      expect(error.isOperational).toBe(true)
      expect(error.name).toBe("AppError")
    })

    it("omits details from JSON when absent", () => {
      const error = new AppError("NOT_FOUND", "Order not found", 404)

      expect(error.toJSON()).toEqual({
        code: "NOT_FOUND",
        message: "Order not found",
      })
    })
  })

  describe("ValidationError", () => {
    it("converts zod issues into field details", () => {
      const error = ValidationError.fromZodError({
        issues: [
          { path: ["order", "title"], message: "Required" },
          { path: ["fullAmount"], message: "Expected number" },
        ],
      })

      expect(error.details).toEqual([
        { field: "order.title", message: "Required" },
        { field: "fullAmount", message: "Expected number" },
      ])
    })

    it("lists missing fields in message and details", () => {
      const error = ValidationError.missingFields(["userId", "title"])

      expect(error.message).toBe("Missing required fields: userId, title")
      expect(error.statusCode).toBe(400)
      expect(error.details).toEqual([
        { field: "userId", message: "Required", code: "missing" },
        { field: "title", message: "Required", code: "missing" },
      ])
    })
  })

  describe("Specialized Error Classes", () => {
    it("NotFoundError has correct defaults", () => {
      const error = new NotFoundError()
      expect(error.code).toBe("NOT_FOUND")
      expect(error.statusCode).toBe(404)
    })

    it("InternalError has correct defaults", () => {
      const error = new InternalError()
      expect(error.code).toBe("INTERNAL_ERROR")
      expect(error.statusCode).toBe(500)
    })

    it("BackendUnavailableError keeps the upstream status", () => {
      const error = new BackendUnavailableError("list failed", 502)
      expect(error.code).toBe("BACKEND_UNAVAILABLE")
      expect(error.statusCode).toBe(503)
      expect(error.httpStatus).toBe(502)
    })

    it("VectorStoreError is a 503", () => {
      const error = new VectorStoreError()
      expect(error.code).toBe("VECTOR_STORE_FAILED")
      expect(error.statusCode).toBe(503)
    })

    it("EmbeddingFailedError has correct defaults", () => {
      const error = new EmbeddingFailedError()
      expect(error.code).toBe("EMBEDDING_FAILED")
      expect(error.message).toBe("Embedding generation failed")
    })

    it("ConfigError is not operational", () => {
      const error = new ConfigError()
      expect(error.code).toBe("CONFIG_INVALID")
      expect(error.isOperational).toBe(false)
      expect(error.name).toBe("ConfigError")
    })
  })

  describe("isAppError", () => {
    it("returns true for AppError subclasses", () => {
      expect(isAppError(new VectorStoreError())).toBe(true)
      expect(isAppError(new ValidationError())).toBe(true)
    })

    it("returns false for non-AppError values", () => {
      expect(isAppError(new Error("test"))).toBe(false)
      expect(isAppError(null)).toBe(false)
      expect(isAppError({ code: "VALIDATION_ERROR" })).toBe(false)
    })
  })

  describe("toAppError", () => {
    it("returns AppError unchanged", () => {
      const original = new NotFoundError("Order 7 not found")
      expect(toAppError(original)).toBe(original)
    })

    it("wraps regular Error in InternalError", () => {
      const result = toAppError(new Error("Something broke"))
      expect(result).toBeInstanceOf(InternalError)
      expect(result.code).toBe("INTERNAL_ERROR")
    })

    it("wraps non-Error values in InternalError", () => {
      expect(toAppError("string error")).toBeInstanceOf(InternalError)
      expect(toAppError(undefined)).toBeInstanceOf(InternalError)
    })
  })

  describe("errorMessage", () => {
    it("reads Error messages and stringifies the rest", () => {
      expect(errorMessage(new Error("boom"))).toBe("boom")
      expect(errorMessage(42)).toBe("42")
    })
  })
})
