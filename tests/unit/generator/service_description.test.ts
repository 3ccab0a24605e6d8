import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import {
  loadServiceDescription,
  parseServiceDescription,
} from "../../../src/generator/discovery/service_description.js";
import { CodegenError } from "../../../src/generator/errors/codegen_errors.js";

function writeTemp(contents: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "service-codegen-"));
  const filePath = path.join(dir, "discovery.json");
  fs.writeFileSync(filePath, contents, "utf8");
  return filePath;
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected an error");
}

describe("parseServiceDescription", () => {
  it("keeps the fields the generator reads", () => {
    expect(
      parseServiceDescription({
        kind: "discovery#restDescription",
        name: "books",
        version: "v1",
        title: "Books API",
        resources: {},
      }),
    ).toEqual({ name: "books", version: "v1", title: "Books API" });
  });

  it("requires a non-empty name", () => {
    const err = captureError(() => parseServiceDescription({ name: "  " }, "books.json"));
    expect(err).toBeInstanceOf(CodegenError);
    expect(err).toMatchObject({
      code: "InvalidServiceDescription",
      subject: "books.json",
      message: 'Missing service "name"',
    });
  });

  it("rejects non-object documents", () => {
    expect(captureError(() => parseServiceDescription(["books"]))).toMatchObject({
      code: "InvalidServiceDescription",
      subject: "<inline>",
      message: "Discovery document must be a JSON object",
    });
  });

  it("rejects optional fields of the wrong type", () => {
    expect(
      captureError(() => parseServiceDescription({ name: "books", version: 1 })),
    ).toMatchObject({ message: '"version" must be a string' });
  });
});

describe("loadServiceDescription", () => {
  it("reads a discovery document from disk", () => {
    const filePath = writeTemp(JSON.stringify({ name: "calendar", version: "v3" }));
    expect(loadServiceDescription(filePath)).toEqual({
      name: "calendar",
      version: "v3",
    });
  });

  it("reports malformed JSON against the file", () => {
    const filePath = writeTemp("{ name: ");
    const err = captureError(() => loadServiceDescription(filePath));
    expect(err).toMatchObject({
      code: "InvalidServiceDescription",
      subject: filePath,
    });
    expect(err instanceof Error && err.message.startsWith("Invalid JSON: ")).toBe(true);
  });
});
