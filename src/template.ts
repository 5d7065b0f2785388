/**
 * Tiny template language for custom Waybar text and tooltips.
 *
 *   {name}              replaced by the field value
 *   {?name}...{/name}   kept only when `name` has a value
 *   {?a&b}...{/}        kept only when every listed field has a value
 *
 * A field "has a value" when it is present, non-empty and not "Not started".
 * Unknown `{name}` placeholders are left as written.
 */

export type TemplateFields = Record<string, string>;

const NOT_STARTED = "Not started";

const MULTI_CONDITIONAL = /\{\?([^}]+&[^}]+)\}([\s\S]*?)\{\/\}/g;
const SINGLE_CONDITIONAL = /\{\?(\w+)\}([\s\S]*?)\{\/\1\}/g;
const PLACEHOLDER = /\{(\w+)\}/g;

function hasValue(fields: TemplateFields, name: string): boolean {
  const value = fields[name.trim()];
  return value !== undefined && value !== "" && value !== NOT_STARTED;
}

function substitute(template: string, fields: TemplateFields): string {
  return template.replace(PLACEHOLDER, (match, name: string) =>
    Object.hasOwn(fields, name) ? fields[name] : match
  );
}

export function formatTemplate(template: string, fields: TemplateFields): string {
  const withMulti = template.replace(
    MULTI_CONDITIONAL,
    (_match, names: string, content: string) =>
      names.split("&").every((name) => hasValue(fields, name)) ? content : ""
  );

  const withSingle = withMulti.replace(
    SINGLE_CONDITIONAL,
    (_match, name: string, content: string) =>
      hasValue(fields, name) ? content : ""
  );

  return substitute(withSingle, fields);
}
