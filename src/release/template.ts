import { promises as fs } from "node:fs";
import type { Logger } from "../logger.js";

export const DEFAULT_TEMPLATE = "Release $DATE\n$CHECKLIST";

const PLACEHOLDER_PATTERN = /\$([A-Z][A-Z_]*)/g;
const TEMPLATE_PATTERN = /\$ITEMS\{([^}]*)\}|\$([A-Z][A-Z_]*)/g;

export type TemplateValues = Record<string, string>;

function lookup(values: TemplateValues, name: string, match: string): string {
  return Object.prototype.hasOwnProperty.call(values, name) ? values[name] : match;
}

/**
 * Replace `$NAME` placeholders. Names without a value are left as written,
 * so a literal `$HOME` in a template survives.
 *
 * `$ITEMS{...}` repeats its contents once per entry of `items`, joined by
 * newlines. Inside the block, item values take precedence over `values`.
 * Substituted text is never scanned again.
 */
export function renderTemplate(
  template: string,
  values: TemplateValues,
  items: TemplateValues[] = []
): string {
  return template.replace(
    TEMPLATE_PATTERN,
    (match, block: string | undefined, name: string | undefined) => {
      if (block !== undefined) {
        return items
          .map((item) => {
            const scope = { ...values, ...item };
            return block.replace(PLACEHOLDER_PATTERN, (inner, innerName: string) =>
              lookup(scope, innerName, inner)
            );
          })
          .join("\n");
      }
      return name === undefined ? match : lookup(values, name, match);
    }
  );
}

export async function loadTemplate(
  path: string | undefined,
  logger: Logger
): Promise<string> {
  if (!path) return DEFAULT_TEMPLATE;
  try {
    return await fs.readFile(path, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.warn(`Cannot read template ${path} (${reason}), using the default template`);
    return DEFAULT_TEMPLATE;
  }
}
