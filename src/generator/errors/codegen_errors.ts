/**
 * Code generator error types and helpers
 */

export type CodegenErrorCode =
  | "InvalidIdentifier"
  | "UnsupportedNode"
  | "DuplicateMember"
  | "InvalidServiceDescription"
  | "InternalError";

export class CodegenError extends Error {
  readonly code: CodegenErrorCode;
  /** Name of the class, member or file the error is about */
  readonly subject: string;
  readonly suggestion?: string;

  constructor(
    code: CodegenErrorCode,
    message: string,
    subject: string,
    suggestion?: string,
  ) {
    super(message);
    this.name = "CodegenError";
    this.code = code;
    this.subject = subject;
    this.suggestion = suggestion;
  }
}

export class AggregateCodegenError extends Error {
  readonly errors: CodegenError[];

  constructor(errors: CodegenError[]) {
    super(AggregateCodegenError.formatMessage(errors));
    this.name = "AggregateCodegenError";
    this.errors = errors;
  }

  private static formatMessage(errors: CodegenError[]): string {
    const header = `Code generation failed with ${errors.length} error(s):`;
    const lines = errors.map((err) => {
      const suggestion = err.suggestion ? ` (hint: ${err.suggestion})` : "";
      return `- [${err.code}] ${err.subject}: ${err.message}${suggestion}`;
    });
    return [header, ...lines].join("\n");
  }
}
