/**
 * Error collector for code generation
 */

import {
  AggregateCodegenError,
  type CodegenError,
} from "./codegen_errors.js";

/**
 * Batches errors for one emit or validation pass. An identifier read in
 * several statements of the same member is reported once: errors with the
 * same code, subject and message collapse into the first.
 */
export class ErrorCollector {
  private errors: CodegenError[] = [];
  private readonly keys = new Set<string>();

  add(error: CodegenError): void {
    const key = `${error.code}\u0000${error.subject}\u0000${error.message}`;
    if (this.keys.has(key)) return;
    this.keys.add(key);
    this.errors.push(error);
  }

  hasErrors(): boolean {
    return this.errors.length > 0;
  }

  getErrors(): CodegenError[] {
    return [...this.errors];
  }

  throwIfErrors(): void {
    if (this.errors.length > 0) {
      throw new AggregateCodegenError(this.errors);
    }
  }
}
