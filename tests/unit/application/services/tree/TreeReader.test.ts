import * as path from "path";
import { TreeReader } from "../../../../../src/application/services/tree/TreeReader";
import { IgnorePatternManager } from "../../../../../src/application/services/filter/IgnorePatternManager";
import { ProgressReporter } from "../../../../../src/application/ports/driven/ProgressReporter";
import { InMemoryFileSystem } from "../../../../helpers/InMemoryFileSystem";
import { createMockLogger } from "../../../../helpers/mockLogger";

describe("TreeReader", () => {
  const ROOT = path.resolve("/project");

  let fsPort: InMemoryFileSystem;
  let ignoreManager: IgnorePatternManager;
  let mockLogger: jest.Mocked<ProgressReporter>;
  let reader: TreeReader;

  beforeEach(() => {
    fsPort = new InMemoryFileSystem({
      [path.join(ROOT, "b.txt")]: "b",
      [path.join(ROOT, "B.txt")]: "B",
      [path.join(ROOT, "a.txt")]: "a",
      [path.join(ROOT, "zdir", "x.ts")]: "x",
      [path.join(ROOT, "adir", "y.ts")]: "y",
      [path.join(ROOT, "debug.log")]: "log",
    });
    ignoreManager = new IgnorePatternManager(fsPort, ROOT);
    mockLogger = createMockLogger();
    reader = new TreeReader(fsPort, ignoreManager, mockLogger);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe("listChildren method", () => {
    test("should list directories first, then files, by name", () => {
      const result = reader.listChildren(ROOT);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.map((e) => e.name)).toEqual([
        "adir",
        "zdir",
        "B.txt",
        "a.txt",
        "b.txt",
        "debug.log",
      ]);
    });

    test("should hide ignored entries", () => {
      ignoreManager.setIgnorePatterns(["*.log", "zdir/"]);

      const result = reader.listChildren(ROOT);

      if (!result.ok) throw new Error("listing failed");
      expect(result.value.map((e) => e.name)).toEqual([
        "adir",
        "B.txt",
        "a.txt",
        "b.txt",
      ]);
    });

    test("should report unreadable directories as failures", () => {
      const zdir = path.join(ROOT, "zdir");
      fsPort.markUnreadable(zdir);

      const result = reader.listChildren(zdir);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("FilesystemUnreadable");
      expect(mockLogger.warn).toHaveBeenCalledWith(
        `TreeReader.listChildren: Unreadable directory ${zdir}: EACCES: permission denied`
      );
    });
  });

  describe("orderInTree method", () => {
    test("should order paths as a depth-first walk of the tree", () => {
      const ordered = reader.orderInTree(
        [
          path.join(ROOT, "a.txt"),
          path.join(ROOT, "zdir", "x.ts"),
          path.join(ROOT, "adir"),
          path.join(ROOT, "adir", "y.ts"),
        ],
        ROOT
      );

      expect(ordered).toEqual([
        path.join(ROOT, "adir"),
        path.join(ROOT, "adir", "y.ts"),
        path.join(ROOT, "zdir", "x.ts"),
        path.join(ROOT, "a.txt"),
      ]);
    });

    test("should keep the root first and unknown paths last", () => {
      const outside = path.resolve("/elsewhere/file.txt");
      const ordered = reader.orderInTree(
        [outside, path.join(ROOT, "b.txt"), ROOT],
        ROOT
      );

      expect(ordered).toEqual([ROOT, path.join(ROOT, "b.txt"), outside]);
    });

    test("should not walk directories without requested paths", () => {
      reader.orderInTree([path.join(ROOT, "a.txt")], ROOT);

      expect(fsPort.listCount(path.join(ROOT, "adir"))).toBe(0);
      expect(fsPort.listCount(path.join(ROOT, "zdir"))).toBe(0);
    });

    test("should stop walking once every path inside the root is placed", () => {
      const ordered = reader.orderInTree([path.join(ROOT, "adir", "y.ts")], ROOT);

      expect(ordered).toEqual([path.join(ROOT, "adir", "y.ts")]);
      expect(fsPort.listCount(path.join(ROOT, "adir"))).toBe(1);
      expect(fsPort.listCount(path.join(ROOT, "zdir"))).toBe(0);
    });

    test("should not list the root when every path lies outside it", () => {
      const outside = path.resolve("/elsewhere/file.txt");

      expect(reader.orderInTree([outside], ROOT)).toEqual([outside]);
      expect(fsPort.listCount(ROOT)).toBe(0);
    });
  });
});
