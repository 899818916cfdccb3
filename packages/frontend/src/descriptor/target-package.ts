/**
 * Target package derivation for descriptor files
 */

import { posix } from "node:path";
import type { FileDescriptor } from "./schema.js";
import type { TargetPackage } from "./types.js";

export type PackageOptions = {
  /** Prefix joined in front of derived (non-explicit) package paths */
  readonly importPrefix?: string;
  /** File name -> package path overrides */
  readonly packageMap?: Readonly<Record<string, string>>;
};

/**
 * Replace anything that cannot appear in an identifier with "_"
 */
export const sanitizeIdentifier = (name: string): string => {
  const cleaned = name.replace(/[^A-Za-z0-9_$]/g, "_");
  return /^[0-9]/.test(cleaned) ? `_${cleaned}` : cleaned;
};

const splitOption = (
  option: string
): { readonly path?: string; readonly name?: string } => {
  const semicolon = option.lastIndexOf(";");
  const pathPart = semicolon >= 0 ? option.slice(0, semicolon) : option;
  const namePart = semicolon >= 0 ? option.slice(semicolon + 1) : undefined;
  // A bare "name" without a slash only names the package
  if (!pathPart.includes("/")) {
    return { name: namePart ?? (pathPart || undefined) };
  }
  return { path: pathPart, name: namePart };
};

const normalizeDir = (dir: string): string => (dir === "." ? "" : dir);

/**
 * Import path of the package a file's generated code belongs to
 */
export const targetPackagePath = (
  file: FileDescriptor,
  options: PackageOptions = {}
): string => {
  const prefix = options.importPrefix ?? "";
  const mapped = options.packageMap?.[file.name];
  if (mapped !== undefined) {
    return normalizeDir(posix.join(prefix, mapped));
  }

  const explicit = file.targetPackage
    ? splitOption(file.targetPackage).path
    : undefined;
  if (explicit !== undefined) {
    return explicit;
  }

  return normalizeDir(posix.join(prefix, posix.dirname(file.name)));
};

/**
 * Default identifier for a file's package
 */
export const targetPackageName = (file: FileDescriptor): string => {
  if (file.targetPackage) {
    const option = splitOption(file.targetPackage);
    const fromOption =
      option.name ?? option.path?.slice(option.path.lastIndexOf("/") + 1);
    if (fromOption) {
      return sanitizeIdentifier(fromOption);
    }
  }
  if (file.package) {
    return sanitizeIdentifier(file.package);
  }
  const base = posix.basename(file.name);
  const dot = base.lastIndexOf(".");
  return sanitizeIdentifier(dot > 0 ? base.slice(0, dot) : base);
};

/**
 * Hands out one TargetPackage per import path and gives packages whose
 * names collide an alias, in the order they are first seen.
 */
export class PackageTable {
  private readonly byPath = new Map<string, TargetPackage>();
  private readonly usedNames: Set<string>;

  constructor(reservedNames: readonly string[] = []) {
    this.usedNames = new Set(reservedNames);
  }

  get(path: string, name: string): TargetPackage {
    const existing = this.byPath.get(path);
    if (existing) {
      return existing;
    }

    let pkg: TargetPackage = { path, name };
    if (this.usedNames.has(name)) {
      let suffix = 1;
      while (this.usedNames.has(`${name}_${suffix}`)) {
        suffix++;
      }
      pkg = { path, name, alias: `${name}_${suffix}` };
    }

    this.usedNames.add(pkg.alias ?? pkg.name);
    this.byPath.set(path, pkg);
    return pkg;
  }
}
