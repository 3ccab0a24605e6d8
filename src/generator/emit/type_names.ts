import fs from "node:fs";
import { CodegenError } from "../errors/codegen_errors.js";

export const CLR_TO_CSHARP_KEYWORD = new Map<string, string>([
  ["System.Object", "object"],
  ["System.String", "string"],
  ["System.Boolean", "bool"],
  ["System.Void", "void"],
  ["System.Byte", "byte"],
  ["System.SByte", "sbyte"],
  ["System.Int16", "short"],
  ["System.UInt16", "ushort"],
  ["System.Int32", "int"],
  ["System.UInt32", "uint"],
  ["System.Int64", "long"],
  ["System.UInt64", "ulong"],
  ["System.Single", "float"],
  ["System.Double", "double"],
  ["System.Decimal", "decimal"],
  ["System.Char", "char"],
]);

export const CLR_TO_TYPESCRIPT_KEYWORD = new Map<string, string>([
  ["System.Object", "object"],
  ["System.String", "string"],
  ["System.Boolean", "boolean"],
  ["System.Void", "void"],
  ["System.Byte", "number"],
  ["System.SByte", "number"],
  ["System.Int16", "number"],
  ["System.UInt16", "number"],
  ["System.Int32", "number"],
  ["System.UInt32", "number"],
  ["System.Int64", "number"],
  ["System.UInt64", "number"],
  ["System.Single", "number"],
  ["System.Double", "number"],
  ["System.Decimal", "number"],
  ["System.Char", "string"],
]);

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isValidIdentifier(name: string): boolean {
  return IDENTIFIER_PATTERN.test(name);
}

export type TargetLanguage = "csharp" | "typescript";

const RESERVED_WORDS_URL = new URL(
  "../../../data/reserved_words.json",
  import.meta.url,
);

let reservedWords: Record<TargetLanguage, ReadonlySet<string>> | undefined;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readWordList(json: unknown, language: TargetLanguage): string[] {
  const list = isRecord(json) ? json[language] : undefined;
  if (
    !Array.isArray(list) ||
    !list.every((word): word is string => typeof word === "string")
  ) {
    throw new CodegenError(
      "InternalError",
      `Reserved word list for ${language} is missing or malformed`,
      RESERVED_WORDS_URL.pathname,
    );
  }
  return list;
}

function loadReservedWords(): Record<TargetLanguage, ReadonlySet<string>> {
  if (reservedWords) return reservedWords;
  const json: unknown = JSON.parse(fs.readFileSync(RESERVED_WORDS_URL, "utf8"));
  reservedWords = {
    csharp: new Set(readWordList(json, "csharp")),
    typescript: new Set(readWordList(json, "typescript")),
  };
  return reservedWords;
}

export function isReservedWord(name: string, language: TargetLanguage): boolean {
  return loadReservedWords()[language].has(name);
}

/**
 * "System.IO.TextWriter" -> "System.IO"; "" for unqualified names
 */
export function namespaceOf(fullName: string): string {
  const index = fullName.lastIndexOf(".");
  return index < 0 ? "" : fullName.slice(0, index);
}

export function simpleTypeName(fullName: string): string {
  const index = fullName.lastIndexOf(".");
  return index < 0 ? fullName : fullName.slice(index + 1);
}

/**
 * Name to print for a type in C#: keyword alias, short name when its
 * namespace is imported, otherwise the fully qualified name.
 */
export function toCSharpTypeName(
  fullName: string,
  imports: ReadonlySet<string>,
): string {
  const keyword = CLR_TO_CSHARP_KEYWORD.get(fullName);
  if (keyword) return keyword;
  const ns = namespaceOf(fullName);
  if (ns === "" || imports.has(ns)) return simpleTypeName(fullName);
  return fullName;
}

/**
 * Keyword for CLR primitives; other types print their simple name and are
 * imported by the TypeScript emitter.
 */
export function toTypeScriptTypeName(fullName: string): string {
  return CLR_TO_TYPESCRIPT_KEYWORD.get(fullName) ?? simpleTypeName(fullName);
}

/**
 * "books" -> "Books", "url-shortener" -> "UrlShortener"
 */
export function toPascalCase(name: string): string {
  return name
    .split(/[^A-Za-z0-9]+/)
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join("");
}
