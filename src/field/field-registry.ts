/**
 * Field Registry
 *
 * Resolves a declared type name to its field kind. Type names starting
 * with `+` are looked up in a caller-supplied namespace registry instead
 * of the built-in set.
 *
 * @module field/field-registry
 */

import { ErrorCode } from '../shared/errors/error-codes.js';
import { FieldTypeError, FormConfigError } from '../shared/errors/form-error.js';
import type { FieldAttributes } from './field-spec.js';
import { Field } from './field.js';
import { BUILTIN_KINDS } from './kinds/index.js';
import type { FieldHost, FieldKind } from './types.js';

export class FieldRegistry {
  private readonly kinds = new Map<string, FieldKind>();

  constructor(kinds: readonly FieldKind[] = []) {
    for (const kind of kinds) {
      this.register(kind);
    }
  }

  /**
   * Add a kind. Type names are registered once.
   */
  register(kind: FieldKind): this {
    if (this.kinds.has(kind.type)) {
      throw new FormConfigError(
        `Field type '${kind.type}' is already registered`,
        ErrorCode.DUPLICATE_FIELD,
        { type: kind.type },
      );
    }
    this.kinds.set(kind.type, kind);
    return this;
  }

  has(type: string): boolean {
    return this.kinds.has(type);
  }

  types(): string[] {
    return [...this.kinds.keys()];
  }

  /**
   * Look up a kind by declared type name.
   *
   * @param namespace - Registry searched for `+Name` types
   * @throws FieldTypeError when no kind matches
   */
  resolve(type: string, namespace?: FieldRegistry): FieldKind {
    if (type.startsWith('+')) {
      const bare = type.slice(1);
      const kind = namespace?.kinds.get(bare);
      if (!kind) {
        throw new FieldTypeError(type, { namespace: namespace ? namespace.types() : null });
      }
      return kind;
    }

    const kind = this.kinds.get(type);
    if (!kind) throw new FieldTypeError(type);
    return kind;
  }

  /**
   * Resolve `type` and instantiate a field with the declared attributes.
   *
   * @throws FormConfigError when `options` is declared on a kind that
   *   takes no options list
   */
  create(
    name: string,
    type: string,
    attributes: FieldAttributes,
    host?: FieldHost,
    namespace?: FieldRegistry,
  ): Field {
    const kind = this.resolve(type, namespace);
    if (attributes.options !== undefined && kind.choice !== true) {
      throw new FormConfigError(
        `Field '${name}' of type '${type}' does not take options`,
        ErrorCode.INVALID_PROFILE,
        { field: name, type },
      );
    }
    return new Field(name, kind, attributes, host);
  }
}

let globalRegistry: FieldRegistry | null = null;

/**
 * Process-wide registry holding the built-in kinds. Register custom kinds
 * at startup only.
 */
export function getFieldRegistry(): FieldRegistry {
  globalRegistry ??= new FieldRegistry(BUILTIN_KINDS);
  return globalRegistry;
}
