import type { TypeDeclarationNode } from "../ast/types.js";
import type { ServiceDescription } from "../discovery/service_description.js";

/**
 * Adds members to a generated service class. Decorators run one after
 * another over the same class and only ever append to its members.
 */
export interface ServiceDecorator {
  decorateClass(
    service: ServiceDescription,
    serviceClass: TypeDeclarationNode,
  ): void;
}
