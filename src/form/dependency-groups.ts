/**
 * Dependency Groups
 *
 * Fields that become required together once any one of them is filled
 * in. The forced flags last for one validation run.
 *
 * @module form/dependency-groups
 */

import { hasNonBlank, type Field } from '../field/field.js';
import type { FormParams } from '../field/types.js';

export class DependencyGroups {
  private forced: Field[] = [];

  constructor(private readonly groups: readonly (readonly Field[])[]) {}

  /**
   * Force `required` on every member of each group with a non-blank
   * submitted value. A Boolean submitted as 0 does not count as filled in.
   */
  apply(params: FormParams): void {
    for (const group of this.groups) {
      if (group.length < 2) continue;

      const triggered = group.some((field) => {
        const value = params[field.fullName];
        if (field.type === 'Boolean' && typeof value === 'string' && value.trim() === '0') {
          return false;
        }
        return hasNonBlank(value);
      });
      if (!triggered) continue;

      for (const field of group) {
        if (field.required) continue;
        field.required = true;
        this.forced.push(field);
      }
    }
  }

  /**
   * Restore the flags changed by the last `apply()`.
   */
  revert(): void {
    for (const field of this.forced) {
      field.required = false;
    }
    this.forced = [];
  }

  get forcedFields(): readonly Field[] {
    return this.forced;
  }
}
