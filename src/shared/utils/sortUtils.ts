import { DirectoryEntry } from "../../application/ports/driven/FileSystemPort";

/** Ordena directorios antes que archivos y, dentro de cada tipo, alfabéticamente */
export function compareEntries(a: DirectoryEntry, b: DirectoryEntry): number {
  const aIsDir = a.kind === "directory";
  const bIsDir = b.kind === "directory";
  if (aIsDir === bIsDir) {
    return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
  }
  return aIsDir ? -1 : 1;
}
