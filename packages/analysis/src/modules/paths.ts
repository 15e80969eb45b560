import fs from "node:fs";
import path from "node:path";
import { URI } from "vscode-uri";

export type FileExists = (filePath: string) => boolean;

const PACKAGE_MARKER = "__init__.py";

/**
 * Dotted module name for a source file: the file's own name (or its
 * directory's, for `__init__.py`), prefixed by every enclosing directory
 * that is itself a package.
 */
export function pathToModuleName(filePath: string, fileExists: FileExists = fs.existsSync): string {
  if (!filePath) return "";
  const isPackage = path.basename(filePath) === PACKAGE_MARKER;
  let moduleName = isPackage ? path.basename(path.dirname(filePath)) : path.parse(filePath).name;
  let directory = isPackage ? path.dirname(filePath) : filePath;

  for (;;) {
    directory = path.dirname(directory);
    // the filesystem root is never a package
    if (path.dirname(directory) === directory) break;
    if (!fileExists(path.join(directory, PACKAGE_MARKER))) break;
    moduleName = `${path.basename(directory)}.${moduleName}`;
  }
  return moduleName;
}

export function moduleNameFromUri(uri: string, fileExists: FileExists = fs.existsSync): string {
  return pathToModuleName(URI.parse(uri).fsPath, fileExists);
}
