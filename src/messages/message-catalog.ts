/**
 * Message Catalog
 *
 * Message lookup used when fields record errors. Keys are the English
 * message text with positional placeholders ({1}, {2}, ...); a locale
 * catalog maps a key to its translated template. Unknown keys resolve
 * to themselves, so a literal message can always be passed as the key.
 *
 * @module messages/message-catalog
 */

export type MessageArg = string | number;

/**
 * Message-lookup capability.
 */
export interface MessageLookup {
  resolve(key: string, ...args: MessageArg[]): string;
}

/**
 * Keys used by the built-in field kinds and model binding.
 */
export const Messages = {
  REQUIRED: 'This field is required',
  NOT_MULTIPLE: 'This field does not take multiple values',
  INVALID_OPTION: "'{1}' is not a valid value",
  RANGE_BETWEEN: 'value must be between {1} and {2}',
  RANGE_MIN: 'value must be greater than or equal to {1}',
  RANGE_MAX: 'value must be less than or equal to {1}',
  NOT_UNIQUE: 'Value must be unique in the database',
  TOO_LONG: 'Please limit to {1} characters',
  TOO_SHORT: 'Input must be at least {1} characters',
  NOT_INTEGER: 'Value must be an integer',
  NOT_POSITIVE_INTEGER: 'Value must be a positive integer',
  NOT_MONEY: 'Value cannot be converted to money',
  NOT_EMAIL: 'Email should be of the format {1}',
  NOT_URL: 'Enter a valid URL (for example http://example.com)',
  NOT_BOOLEAN: 'Value must be true or false',
  NOT_DATE: 'Not a valid date',
  NOT_DATETIME: 'Not a valid date and time',
} as const;

const PLACEHOLDER = /\{(\d+)\}/g;

/**
 * Substitute positional placeholders. A placeholder with no matching
 * argument is left as written.
 */
export function interpolate(template: string, args: readonly MessageArg[]): string {
  return template.replace(PLACEHOLDER, (match, index: string) => {
    const arg = args[Number(index) - 1];
    return arg === undefined ? match : String(arg);
  });
}

/**
 * Catalog-backed message lookup.
 */
export class MessageCatalog implements MessageLookup {
  private readonly templates: Map<string, string>;

  constructor(
    public readonly locale = 'en',
    templates: Record<string, string> = {},
  ) {
    this.templates = new Map(Object.entries(templates));
  }

  resolve(key: string, ...args: MessageArg[]): string {
    return interpolate(this.templates.get(key) ?? key, args);
  }

  /**
   * Return a catalog with additional or replaced templates.
   */
  extend(templates: Record<string, string>): MessageCatalog {
    return new MessageCatalog(this.locale, {
      ...Object.fromEntries(this.templates),
      ...templates,
    });
  }
}

let defaultCatalog: MessageLookup | null = null;

/**
 * Process-wide lookup used by fields that have no form, and by forms
 * created without an explicit one. Read-only once the process is running.
 */
export function getDefaultMessages(): MessageLookup {
  defaultCatalog ??= new MessageCatalog();
  return defaultCatalog;
}

export function setDefaultMessages(messages: MessageLookup): void {
  defaultCatalog = messages;
}
