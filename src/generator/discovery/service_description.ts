/**
 * Discovery document loading
 */

import fs from "node:fs";
import { CodegenError } from "../errors/codegen_errors.js";

/**
 * The part of a discovery document the generator reads
 */
export interface ServiceDescription {
  name: string;
  version?: string;
  title?: string;
  description?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(
  doc: Record<string, unknown>,
  key: string,
  subject: string,
): string | undefined {
  const value = doc[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new CodegenError(
      "InvalidServiceDescription",
      `"${key}" must be a string`,
      subject,
    );
  }
  return value;
}

export function parseServiceDescription(
  json: unknown,
  subject = "<inline>",
): ServiceDescription {
  if (!isRecord(json)) {
    throw new CodegenError(
      "InvalidServiceDescription",
      "Discovery document must be a JSON object",
      subject,
    );
  }
  const name = json.name;
  if (typeof name !== "string" || name.trim() === "") {
    throw new CodegenError(
      "InvalidServiceDescription",
      'Missing service "name"',
      subject,
      'Add a non-empty "name" field to the discovery document.',
    );
  }
  return {
    name,
    version: optionalString(json, "version", subject),
    title: optionalString(json, "title", subject),
    description: optionalString(json, "description", subject),
  };
}

export function loadServiceDescription(filePath: string): ServiceDescription {
  const text = fs.readFileSync(filePath, "utf8");
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CodegenError(
      "InvalidServiceDescription",
      `Invalid JSON: ${reason}`,
      filePath,
    );
  }
  return parseServiceDescription(json, filePath);
}
