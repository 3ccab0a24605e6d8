/**
 * Service class generation: build the class, run decorators, emit source
 */

import { type CodeFactory, codeFactory } from "./ast/factory.js";
import type { NamespaceNode, TypeDeclarationNode } from "./ast/types.js";
import {
  NewtonsoftObjectToJson,
  OBJECT_TO_JSON_IMPORTS,
} from "./decorators/newtonsoft_object_to_json.js";
import type { ServiceDecorator } from "./decorators/service_decorator.js";
import type { ServiceDescription } from "./discovery/service_description.js";
import { CSharpEmitter } from "./emit/csharp_emitter.js";
import { toPascalCase } from "./emit/type_names.js";
import { TypeScriptEmitter } from "./emit/typescript_emitter.js";
import { CodegenError } from "./errors/codegen_errors.js";
import { ErrorCollector } from "./errors/error_collector.js";

export type EmitTarget = "csharp" | "typescript";

export const DEFAULT_NAMESPACE = "Generated.Apis";

export interface ServiceGeneratorOptions {
  decorators?: ServiceDecorator[];
  factory?: CodeFactory;
  /** Report members that share a name after all decorators ran */
  checkMemberNames?: boolean;
  verbose?: boolean;
}

export interface GenerateSourceOptions {
  target?: EmitTarget;
  namespace?: string;
  /** C# usings; defaults to OBJECT_TO_JSON_IMPORTS */
  imports?: readonly string[];
  /** TypeScript module specifier per CLR namespace */
  modules?: Readonly<Record<string, string>>;
}

export function serviceClassName(service: ServiceDescription): string {
  const base = toPascalCase(service.name);
  const name = `${base}Service`;
  return /^[0-9]/.test(name) ? `_${name}` : name;
}

export class ServiceGenerator {
  private readonly decorators: ServiceDecorator[];
  private readonly factory: CodeFactory;
  private readonly checkMemberNames: boolean;
  private readonly verbose: boolean;

  constructor(options: ServiceGeneratorOptions = {}) {
    this.factory = options.factory ?? codeFactory;
    this.decorators = options.decorators ?? [
      new NewtonsoftObjectToJson(this.factory),
    ];
    this.checkMemberNames = options.checkMemberNames ?? true;
    this.verbose = options.verbose ?? false;
  }

  /**
   * Creates the service class and applies every decorator in order
   */
  generateClass(service: ServiceDescription): TypeDeclarationNode {
    const serviceClass = this.factory.typeDeclaration({
      name: serviceClassName(service),
      access: "public",
      isPartial: true,
    });

    for (const decorator of this.decorators) {
      const before = serviceClass.members.length;
      decorator.decorateClass(service, serviceClass);
      if (this.verbose) {
        console.log(
          `${decorator.constructor.name}: added ${serviceClass.members.length - before} member(s) to ${serviceClass.name}`,
        );
      }
    }

    if (this.checkMemberNames) {
      this.validateMemberNames(serviceClass);
    }
    return serviceClass;
  }

  /**
   * Wraps the generated class in its namespace. The import list is copied,
   * so editing the node never reaches OBJECT_TO_JSON_IMPORTS.
   */
  generateNamespace(
    service: ServiceDescription,
    options: Pick<GenerateSourceOptions, "namespace" | "imports"> = {},
  ): NamespaceNode {
    const serviceClass = this.generateClass(service);
    return this.factory.namespace(
      options.namespace ?? DEFAULT_NAMESPACE,
      [...(options.imports ?? OBJECT_TO_JSON_IMPORTS)],
      [serviceClass],
    );
  }

  generateSource(
    service: ServiceDescription,
    options: GenerateSourceOptions = {},
  ): string {
    const ns = this.generateNamespace(service, options);
    const target = options.target ?? "csharp";
    if (this.verbose) {
      console.log(`Emitting ${serviceClassName(service)} as ${target}`);
    }
    return target === "typescript"
      ? new TypeScriptEmitter({ modules: options.modules }).emitNamespace(ns)
      : new CSharpEmitter().emitNamespace(ns);
  }

  private validateMemberNames(serviceClass: TypeDeclarationNode): void {
    const errors = new ErrorCollector();
    const seen = new Set<string>();
    const reported = new Set<string>();
    for (const member of serviceClass.members) {
      if (!seen.has(member.name)) {
        seen.add(member.name);
        continue;
      }
      if (reported.has(member.name)) continue;
      reported.add(member.name);
      errors.add(
        new CodegenError(
          "DuplicateMember",
          `Member "${member.name}" is declared more than once`,
          serviceClass.name,
          "Check that each decorator is applied only once",
        ),
      );
    }
    errors.throwIfErrors();
  }
}
