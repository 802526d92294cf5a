import { HttpStatus } from '@nestjs/common';
import { ApiErrorDefinition, CORE_API_ERRORS } from './api-error-codes';

const DEFAULT_NAMESPACE = 'core';

function namespaceOf(code: string): string {
  const separator = code.indexOf(':');
  return separator > 0 ? code.substring(0, separator) : DEFAULT_NAMESPACE;
}

/**
 * Registry of API error codes.
 *
 * Core codes are registered on construction. Feature modules may register
 * their own namespace; codes without a namespace are prefixed with it.
 */
export class ApiErrorRegistry {
  private readonly codes = new Map<string, ApiErrorDefinition>();
  private readonly byNamespace = new Map<string, string[]>();

  constructor(definitions: readonly ApiErrorDefinition[] = CORE_API_ERRORS) {
    definitions.forEach((definition) => this.register(definition));
  }

  register(definition: ApiErrorDefinition): void {
    const isNew = !this.codes.has(definition.code);
    this.codes.set(definition.code, definition);

    if (isNew) {
      const namespace = namespaceOf(definition.code);
      const codes = this.byNamespace.get(namespace) ?? [];
      codes.push(definition.code);
      this.byNamespace.set(namespace, codes);
    }
  }

  registerNamespace(
    namespace: string,
    definitions: readonly ApiErrorDefinition[],
  ): void {
    for (const definition of definitions) {
      this.register({
        ...definition,
        code: definition.code.includes(':')
          ? definition.code
          : `${namespace}:${definition.code}`,
      });
    }
  }

  get(code: string): ApiErrorDefinition | undefined {
    return this.codes.get(code);
  }

  all(): ApiErrorDefinition[] {
    return [...this.codes.values()];
  }

  listNamespace(namespace: string): ApiErrorDefinition[] {
    const codes = this.byNamespace.get(namespace) ?? [];
    return codes.flatMap((code) => {
      const definition = this.codes.get(code);
      return definition ? [definition] : [];
    });
  }

  namespaces(): string[] {
    return [...this.byNamespace.keys()];
  }

  /** Unknown codes map to 500. */
  httpStatus(code: string): HttpStatus {
    return this.codes.get(code)?.httpStatus ?? HttpStatus.INTERNAL_SERVER_ERROR;
  }

  /** Unknown codes fall back to the code itself. */
  message(code: string): string {
    return this.codes.get(code)?.message ?? code;
  }

  /** First registered code carrying the given status. */
  codeForStatus(status: number): string | undefined {
    for (const definition of this.codes.values()) {
      if (definition.httpStatus === status) {
        return definition.code;
      }
    }
    return undefined;
  }
}

export const apiErrorRegistry = new ApiErrorRegistry();
