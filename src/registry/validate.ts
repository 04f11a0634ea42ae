import type { Module } from "../core/modules/module";

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

/**
 * Check a module's export list against its dictionary.
 */
export function validateModule(module: Module): ValidationResult {
  const errors: string[] = [];

  if (!module.name) {
    errors.push("missing module name");
  }
  for (const name of module.exportedNames()) {
    if (!module.findExportedWord(name)) {
      errors.push(`${module.name}: exported word ${name} is not defined`);
    }
  }

  return { valid: errors.length === 0, errors };
}
