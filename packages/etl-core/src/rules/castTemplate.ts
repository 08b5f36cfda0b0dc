import { ConfigurationError } from "../errors";

export const CAST_PLACEHOLDER = "%s";

export interface CastTemplate {
  template: string;
  apply: (columnRef: string) => string;
}

function countPlaceholders(template: string): number {
  return template.split(CAST_PLACEHOLDER).length - 1;
}

export function compileCastTemplate(template: string): CastTemplate {
  const placeholders = countPlaceholders(template);

  if (placeholders !== 1) {
    throw new ConfigurationError(
      `Cast template must contain exactly one ${CAST_PLACEHOLDER} placeholder (found ${placeholders}): ${template}`
    );
  }

  const slot = template.indexOf(CAST_PLACEHOLDER);
  const prefix = template.slice(0, slot);
  const suffix = template.slice(slot + CAST_PLACEHOLDER.length);

  return {
    template,
    apply(columnRef: string): string {
      return `${prefix}${columnRef}${suffix}`;
    }
  };
}
