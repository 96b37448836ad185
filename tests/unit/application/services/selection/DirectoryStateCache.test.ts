import * as path from "path";
import { DirectoryStateCache } from "../../../../../src/application/services/selection/DirectoryStateCache";
import { TriState } from "../../../../../src/domain/model/TriState";

describe("DirectoryStateCache", () => {
  const ROOT = path.resolve("/project");
  let cache: DirectoryStateCache;

  beforeEach(() => {
    cache = new DirectoryStateCache();
  });

  test("should return undefined for unknown directories", () => {
    expect(cache.get(ROOT)).toBeUndefined();
  });

  test("should memoize and invalidate by normalized path", () => {
    cache.put(path.join(ROOT, "sub"), TriState.PartiallySelected);

    expect(cache.get(`${ROOT}/sub/`)).toBe(TriState.PartiallySelected);

    cache.invalidate(`${ROOT}/other/../sub`);
    expect(cache.get(path.join(ROOT, "sub"))).toBeUndefined();
  });

  test("should ignore invalidation of entries that are not cached", () => {
    cache.put(ROOT, TriState.FullySelected);
    cache.invalidate(path.join(ROOT, "nothing"));
    expect(cache.size).toBe(1);
  });

  test("should clear every entry", () => {
    cache.put(ROOT, TriState.FullySelected);
    cache.put(path.join(ROOT, "sub"), TriState.NotSelected);
    cache.clear();
    expect(cache.size).toBe(0);
  });
});
