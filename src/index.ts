export { type CodeFactory, codeFactory } from "./generator/ast/factory.js";
export * from "./generator/ast/types.js";
export {
  buildObjectToJsonMethod,
  buildSerializerCreationBlock,
  buildSerializerField,
  buildSerializerProperty,
  DEFAULT_OBJECT_TO_JSON_NAMES,
  NewtonsoftObjectToJson,
  NewtonsoftTypes,
  OBJECT_TO_JSON_IMPORTS,
  type ObjectToJsonNames,
} from "./generator/decorators/newtonsoft_object_to_json.js";
export type { ServiceDecorator } from "./generator/decorators/service_decorator.js";
export {
  loadServiceDescription,
  parseServiceDescription,
  type ServiceDescription,
} from "./generator/discovery/service_description.js";
export { CSharpEmitter } from "./generator/emit/csharp_emitter.js";
export { isReservedWord, type TargetLanguage } from "./generator/emit/type_names.js";
export {
  moduleSpecifierFor,
  TypeScriptEmitter,
  type TypeScriptEmitterOptions,
} from "./generator/emit/typescript_emitter.js";
export {
  AggregateCodegenError,
  CodegenError,
  type CodegenErrorCode,
} from "./generator/errors/codegen_errors.js";
export {
  DEFAULT_NAMESPACE,
  type EmitTarget,
  type GenerateSourceOptions,
  ServiceGenerator,
  type ServiceGeneratorOptions,
} from "./generator/service_generator.js";
