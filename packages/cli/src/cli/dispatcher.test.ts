/**
 * Tests for CLI command dispatch and exit codes
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { runCli } from "./dispatcher.js";

const withProject = (
  files: Readonly<Record<string, string>>,
  fn: (dir: string) => void
): void => {
  const dir = mkdtempSync(join(tmpdir(), "rvcc-cli-"));
  try {
    for (const [name, content] of Object.entries(files)) {
      writeFileSync(join(dir, name), content);
    }
    fn(dir);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
};

const CALL = JSON.stringify({ args: ["i32", "double"] });

describe("runCli", () => {
  it("should exit with 2 for an unknown command", () => {
    expect(runCli(["link", "-q"])).to.equal(2);
  });

  it("should exit with 2 without a call description", () => {
    expect(runCli(["call", "-q"])).to.equal(2);
  });

  it("should classify with defaults when there is no config file", () => {
    withProject({ "call.json": CALL }, (dir) => {
      expect(runCli(["call", "call.json", "-q"], dir)).to.equal(0);
    });
  });

  it("should pick up rvcc.json from the working directory", () => {
    withProject(
      { "call.json": CALL, "rvcc.json": JSON.stringify({ xlen: 16 }) },
      (dir) => {
        expect(runCli(["call", "call.json", "-q"], dir)).to.equal(1);
      }
    );
  });

  it("should let flags override rvcc.json", () => {
    withProject(
      { "call.json": CALL, "rvcc.json": JSON.stringify({ xlen: 16 }) },
      (dir) => {
        expect(runCli(["call", "call.json", "-q", "-x", "32"], dir)).to.equal(
          0
        );
      }
    );
  });

  it("should fail for a missing --config file", () => {
    withProject({ "call.json": CALL }, (dir) => {
      expect(
        runCli(["ret", "call.json", "-q", "--config", "other.json"], dir)
      ).to.equal(1);
    });
  });

  it("should fail for an invalid call description", () => {
    withProject({ "call.json": JSON.stringify({ args: "i32" }) }, (dir) => {
      expect(runCli(["call", "call.json", "-q"], dir)).to.equal(1);
    });
  });
});
