import * as path from "path";

export function toPosix(relative: string): string {
  return relative.split(path.sep).join("/");
}

export function rel(root: string, absolute: string): string {
  return toPosix(path.relative(root, absolute));
}

/** Clave canónica de una entrada: ruta absoluta resuelta */
export function normalizePath(p: string): string {
  return path.resolve(p);
}

/** true si `candidate` es `root` o está por debajo de él */
export function isWithin(root: string, candidate: string): boolean {
  const relative = path.relative(root, candidate);
  return (
    relative === "" ||
    (!relative.startsWith("..") && !path.isAbsolute(relative))
  );
}

/**
 * Ancestros de `p`, del padre hacia arriba.
 * Se detiene en `stopAt` (incluido) si `p` está dentro de él, o en la raíz del volumen.
 */
export function ancestorsOf(p: string, stopAt?: string): string[] {
  const result: string[] = [];
  const boundary =
    stopAt !== undefined && isWithin(stopAt, p) ? normalizePath(stopAt) : null;
  let current = normalizePath(p);

  while (current !== boundary) {
    const parent = path.dirname(current);
    if (parent === current) break;
    result.push(parent);
    current = parent;
  }
  return result;
}
