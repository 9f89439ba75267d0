/**
 * mysql-advisor - Types Unit Tests
 *
 * Tests for error classes defined in types/index.ts
 */

import { describe, it, expect } from "vitest";
import {
  AdvisorError,
  AcquisitionError,
  ConnectionError,
  AuthenticationError,
  PoolError,
  QueryError,
  MissingPrerequisiteError,
  HostFactError,
  ValidationError,
} from "../index.js";

describe("Error Classes", () => {
  describe("AdvisorError", () => {
    it("should create error with message and code", () => {
      const error = new AdvisorError("Test error", "TEST_CODE");
      expect(error.message).toBe("Test error");
      expect(error.code).toBe("TEST_CODE");
      expect(error.name).toBe("AdvisorError");
    });

    it("should create error with details", () => {
      const details = { variable: "key_buffer_size" };
      const error = new AdvisorError("Test error", "TEST_CODE", details);
      expect(error.details).toEqual(details);
    });

    it("should be instance of Error", () => {
      expect(new AdvisorError("Test", "CODE")).toBeInstanceOf(Error);
    });
  });

  describe("AcquisitionError", () => {
    it("should default to the acquisition failure code", () => {
      const error = new AcquisitionError("Cannot read status");
      expect(error.code).toBe("ACQUISITION_FAILURE");
      expect(error.name).toBe("AcquisitionError");
      expect(error).toBeInstanceOf(AdvisorError);
    });

    it("should accept a custom code", () => {
      const error = new AcquisitionError("Failed", undefined, "CUSTOM");
      expect(error.code).toBe("CUSTOM");
    });
  });

  describe("acquisition subclasses", () => {
    it.each([
      [ConnectionError, "CONNECTION_ERROR", "ConnectionError"],
      [AuthenticationError, "AUTHENTICATION_ERROR", "AuthenticationError"],
      [PoolError, "POOL_ERROR", "PoolError"],
      [QueryError, "QUERY_ERROR", "QueryError"],
    ] as const)("%o should carry its code and name", (ErrorClass, code, name) => {
      const error = new ErrorClass("Failed", { host: "localhost" });
      expect(error.code).toBe(code);
      expect(error.name).toBe(name);
      expect(error.details?.["host"]).toBe("localhost");
      expect(error).toBeInstanceOf(AcquisitionError);
    });
  });

  describe("MissingPrerequisiteError", () => {
    it("should record the prerequisite name", () => {
      const error = new MissingPrerequisiteError("No queries", "Questions");
      expect(error.code).toBe("MISSING_PREREQUISITE");
      expect(error.prerequisite).toBe("Questions");
      expect(error.details).toEqual({ prerequisite: "Questions" });
      expect(error).not.toBeInstanceOf(AcquisitionError);
    });
  });

  describe("HostFactError", () => {
    it("should merge the fact into details", () => {
      const error = new HostFactError("Cannot read", "myisamIndexBytes", {
        path: "/var/lib/mysql",
      });
      expect(error.code).toBe("UNAVAILABLE_HOST_FACT");
      expect(error.fact).toBe("myisamIndexBytes");
      expect(error.details).toEqual({
        fact: "myisamIndexBytes",
        path: "/var/lib/mysql",
      });
    });
  });

  describe("ValidationError", () => {
    it("should create with correct code", () => {
      const error = new ValidationError("Invalid port");
      expect(error.code).toBe("VALIDATION_ERROR");
      expect(error.name).toBe("ValidationError");
    });
  });
});
