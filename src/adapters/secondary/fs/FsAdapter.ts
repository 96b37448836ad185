import * as fs from "fs";
import * as path from "path";
import {
  DirectoryEntry,
  EntryKind,
  FileSystemPort,
} from "../../../application/ports/driven/FileSystemPort";
import {
  failure,
  FsFailureKind,
  FsResult,
  success,
} from "../../../domain/model/FsFailure";
import { normalizePath } from "../../../shared/utils/pathUtils";

// Los errores de fs pueden venir de otro contexto (vm), donde instanceof Error falla
function errorCode(err: unknown): string | undefined {
  return typeof err === "object" &&
    err !== null &&
    "code" in err &&
    typeof err.code === "string"
    ? err.code
    : undefined;
}

function classify(err: unknown, fallback: FsFailureKind): FsFailureKind {
  return errorCode(err) === "ENOENT" ? "NotFound" : fallback;
}

/**
 * Adaptador síncrono para el sistema de archivos local
 */
export class FsAdapter implements FileSystemPort {
  kind(entryPath: string): EntryKind | null {
    try {
      const stats = fs.statSync(entryPath);
      if (stats.isFile()) return "file";
      if (stats.isDirectory()) return "directory";
      return "other";
    } catch {
      return null;
    }
  }

  /**
   * Lista las entradas de un directorio sin seguir enlaces simbólicos
   */
  listDirectory(dirPath: string): FsResult<DirectoryEntry[]> {
    const base = normalizePath(dirPath);
    try {
      const entries = fs.readdirSync(base, { withFileTypes: true });
      return success(
        entries.map((entry): DirectoryEntry => ({
          name: entry.name,
          path: path.join(base, entry.name),
          kind: entry.isDirectory()
            ? "directory"
            : entry.isFile()
              ? "file"
              : "other",
        }))
      );
    } catch (err) {
      return failure(classify(err, "FilesystemUnreadable"), base, err);
    }
  }

  readFile(filePath: string): FsResult<Buffer> {
    try {
      return success(fs.readFileSync(filePath));
    } catch (err) {
      return failure(classify(err, "FileUnopenable"), filePath, err);
    }
  }

  readText(filePath: string): FsResult<string> {
    try {
      return success(fs.readFileSync(filePath, "utf-8"));
    } catch (err) {
      return failure(classify(err, "FileUnopenable"), filePath, err);
    }
  }

  /**
   * Escribe contenido en un archivo, reemplazando el anterior
   */
  writeText(filePath: string, content: string): FsResult<void> {
    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(filePath, content, "utf-8");
      return success(undefined);
    } catch (err) {
      return failure(classify(err, "FileUnopenable"), filePath, err);
    }
  }
}
