/**
 * Import collection for generated gateway files
 *
 * The import list is an ordered sequence plus a set of seen import paths.
 * The first occurrence of a package wins, so the same input always yields
 * the same import block.
 */

import {
  samePackage,
  type EnumLookup,
  type File,
  type Method,
  type TargetPackage,
} from "@protogate/frontend";

export type ImportSet = {
  readonly packages: TargetPackage[];
  readonly seen: Set<string>;
};

export type ImportOptions = {
  readonly baseImports: readonly TargetPackage[];
  readonly standalone: boolean;
};

const createImportSet = (): ImportSet => ({ packages: [], seen: new Set() });

const add = (set: ImportSet, pkg: TargetPackage): void => {
  set.seen.add(pkg.path);
  set.packages.push(pkg);
};

/**
 * Add `pkg` unless it is the file's own package or already imported
 */
const addForeign = (set: ImportSet, file: File, pkg: TargetPackage): void => {
  if (samePackage(pkg, file.targetPackage) || set.seen.has(pkg.path)) {
    return;
  }
  add(set, pkg);
};

/**
 * Packages of enums bound as path parameters.
 * Targets that are not enums are skipped.
 */
const addEnumPathParamImports = (
  set: ImportSet,
  file: File,
  method: Method,
  lookup: EnumLookup
): void => {
  for (const binding of method.bindings) {
    for (const param of binding.pathParams) {
      const found = lookup.lookupEnum("", param.target.typeName ?? "");
      if (!found.ok) continue;
      addForeign(set, file, found.value.file.targetPackage);
    }
  }
};

/**
 * Compute the ordered, de-duplicated import list for a file's gateway
 */
export const collectImports = (
  file: File,
  options: ImportOptions,
  lookup: EnumLookup
): readonly TargetPackage[] => {
  const set = createImportSet();

  for (const pkg of options.baseImports) {
    if (!set.seen.has(pkg.path)) {
      add(set, pkg);
    }
  }

  if (options.standalone && !set.seen.has(file.targetPackage.path)) {
    add(set, file.targetPackage);
  }

  for (const service of file.services) {
    for (const method of service.methods) {
      addEnumPathParamImports(set, file, method, lookup);
      if (method.bindings.length === 0) continue;
      addForeign(set, file, method.requestType.file.targetPackage);
    }
  }

  return set.packages;
};
