import { describe, expect, it } from "vitest";
import {
  CommandApprovalRequiredError,
  CommandDangerousPatternError,
  CommandExecutionError,
  CommandMalformedInputError,
  CommandNotPermittedError,
  CommandPolicyConfigurationError,
  CommandPolicyError,
  ERROR_CATALOG,
  SessionApprovalInvalidError,
  SessionError,
  SessionRequiredError,
  ShellgateError,
} from "../../index.js";

describe("CommandPolicyError hierarchy", () => {
  describe("CommandMalformedInputError", () => {
    it("should extend CommandPolicyError and ShellgateError", () => {
      const error = new CommandMalformedInputError('ls "x', "unterminated quote");
      expect(error).toBeInstanceOf(CommandPolicyError);
      expect(error).toBeInstanceOf(ShellgateError);
    });

    it("should map to catalog entry", () => {
      const error = new CommandMalformedInputError('ls "x', "unterminated quote");
      const entry = ERROR_CATALOG.COMMAND_MALFORMED_INPUT;
      expect(error.code).toBe("COMMAND_MALFORMED_INPUT");
      expect(error._tag).toBe("ValidationError");
      expect(error.httpStatus).toBe(entry.httpStatus);
      expect(error.grpcCode).toBe(entry.grpcCode);
      expect(error.domain).toBe("command-policy");
    });

    it("should prefix the detail in the message", () => {
      const error = new CommandMalformedInputError('ls "x', "unterminated quote");
      expect(error.message).toBe("malformed input: unterminated quote");
      expect(error.command).toBe('ls "x');
      expect(error.detail).toBe("unterminated quote");
    });
  });

  describe("CommandDangerousPatternError", () => {
    it("should carry pattern and segment index", () => {
      const error = new CommandDangerousPatternError("rm -rf /", "rm\\s+-rf\\s+/", 0);
      expect(error.message).toBe("dangerous pattern: rm\\s+-rf\\s+/");
      expect(error.pattern).toBe("rm\\s+-rf\\s+/");
      expect(error.segmentIndex).toBe(0);
      expect(error._tag).toBe("PermissionError");
      expect(error.httpStatus).toBe(403);
    });

    it("should allow a null segment index", () => {
      expect(new CommandDangerousPatternError("a | b", "a \\| b", null).segmentIndex).toBeNull();
    });
  });

  describe("CommandNotPermittedError", () => {
    it("should name the base command", () => {
      const error = new CommandNotPermittedError("cat f; sudo reboot", "sudo", "blocked", 1);
      expect(error.message).toBe("command not permitted: sudo");
      expect(error.category).toBe("blocked");
      expect(error.segmentIndex).toBe(1);
      expect(error.toJSON().code).toBe("COMMAND_NOT_PERMITTED");
    });
  });

  describe("CommandApprovalRequiredError", () => {
    it("should list categories and record the session", () => {
      const error = new CommandApprovalRequiredError("mkdir a", ["write", "system"], "s-1");
      expect(error.message).toBe("approval required for write, system commands in session s-1");
      expect(error.metadata).toEqual({ sessionId: "s-1" });
      expect(error.grpcCode).toBe("FAILED_PRECONDITION");
    });
  });

  describe("CommandPolicyConfigurationError", () => {
    it("should be unexpected and carry issues", () => {
      const issues = [{ field: "commands.dangerous_patterns.0", message: "bad regex", code: "invalid_regex" }];
      const error = new CommandPolicyConfigurationError("bad regex", issues);
      expect(error.message).toBe("Invalid command policy configuration: bad regex");
      expect(error.issues).toEqual(issues);
      expect(error.isExpected).toBe(false);
    });
  });

  describe("CommandExecutionError", () => {
    it("should keep the cause", () => {
      const cause = new Error("ENOENT");
      const error = new CommandExecutionError("ls", "spawn failed", { cause });
      expect(error.cause).toBe(cause);
      expect(error._tag).toBe("ExternalError");
      expect(error.httpStatus).toBe(500);
    });
  });
});

describe("SessionError hierarchy", () => {
  it("should describe a missing session id", () => {
    const error = new SessionRequiredError();
    expect(error.message).toBe("session id required");
    expect(error.domain).toBe("session");
    expect(error).toBeInstanceOf(SessionError);
    expect(error).not.toBeInstanceOf(CommandPolicyError);
  });

  it("should name the rejected category", () => {
    const error = new SessionApprovalInvalidError("read");
    expect(error.category).toBe("read");
    expect(error.message).toBe('Cannot approve category "read": only write and system are approvable');
    expect(error.isExpected).toBe(true);
  });
});
