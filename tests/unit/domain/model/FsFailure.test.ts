import { failure, success } from "../../../../src/domain/model/FsFailure";

describe("FsFailure", () => {
  test("should wrap a value in a success result", () => {
    expect(success(3)).toEqual({ ok: true, value: 3 });
  });

  test("should take the message of an Error cause", () => {
    const result = failure("FileUnopenable", "/tmp/a.txt", new Error("EACCES: denied"));

    expect(result).toEqual({
      ok: false,
      error: { kind: "FileUnopenable", path: "/tmp/a.txt", message: "EACCES: denied" },
    });
  });

  test("should take the message of an error-like object from another context", () => {
    const foreign = { code: "ENOENT", message: "ENOENT: no such file or directory" };

    const result = failure("NotFound", "/tmp/gone", foreign);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe("ENOENT: no such file or directory");
  });

  test("should stringify any other cause", () => {
    const result = failure("FilesystemUnreadable", "/tmp/dir", "EACCES: permission denied");

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe("EACCES: permission denied");
  });
});
