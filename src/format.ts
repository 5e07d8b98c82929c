/** Thrown when a message template cannot take exactly one string argument. */
export class TemplateFormatError extends Error {
  constructor(
    readonly template: string,
    readonly index: number,
    reason: string,
  ) {
    super(`Invalid template "${template}" at index ${index}: ${reason}`);
    this.name = "TemplateFormatError";
  }
}

// %[-][width][.precision]conversion
const SPECIFIER = /%(-?)(\d*)(?:\.(\d+))?([sSn%])/y;

/**
 * Substitute `value` at the string placeholder of `template`.
 *
 * Accepted specifiers:
 * - `%s`, or `%S` for upper case, with optional `-` (left-justify), width
 *   and `.precision` (truncate), e.g. `%-8s`, `%10s`, `%.3s`
 * - `%%` for a literal percent sign, `%n` for a line break
 *
 * A template without a placeholder is returned unchanged. A second string
 * placeholder, any other conversion (`%d`, `%f`, ...) or a dangling `%` is
 * an error.
 */
export function formatTemplate(template: string, value: string): string {
  let out = "";
  let used = false;
  let i = 0;

  while (i < template.length) {
    const next = template.indexOf("%", i);
    if (next === -1) {
      out += template.slice(i);
      break;
    }
    out += template.slice(i, next);

    SPECIFIER.lastIndex = next;
    const match = SPECIFIER.exec(template);
    if (!match) {
      if (next === template.length - 1) {
        throw new TemplateFormatError(template, next, "dangling %");
      }
      throw new TemplateFormatError(
        template,
        next,
        `unsupported conversion ${template.slice(next, next + 2)}`,
      );
    }

    const [spec, leftJustify, width, precision, conversion] = match;
    if (conversion === "s" || conversion === "S") {
      if (used) {
        throw new TemplateFormatError(
          template,
          next,
          `missing argument for ${spec}`,
        );
      }
      if (leftJustify && !width) {
        throw new TemplateFormatError(template, next, `${spec} needs a width`);
      }
      used = true;

      let text = precision === undefined ? value : value.slice(0, Number(precision));
      if (conversion === "S") text = text.toUpperCase();
      const size = width ? Number(width) : 0;
      out += leftJustify ? text.padEnd(size) : text.padStart(size);
    } else {
      if (spec.length !== 2) {
        throw new TemplateFormatError(
          template,
          next,
          `${spec} takes no flags, width or precision`,
        );
      }
      out += conversion === "n" ? "\n" : "%";
    }

    i = next + spec.length;
  }

  return out;
}
