import { ConsoleProgressReporter } from "../../../../../src/adapters/secondary/reporting/ConsoleProgressReporter";

describe("ConsoleProgressReporter", () => {
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;
  let debugSpy: jest.SpyInstance;
  let timeSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    debugSpy = jest.spyOn(console, "debug").mockImplementation(() => undefined);
    timeSpy = jest.spyOn(console, "time").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test("should print messages without prefixes by default", () => {
    const reporter = new ConsoleProgressReporter();

    reporter.info("hello");
    reporter.warn("careful");
    reporter.error("broken");

    expect(logSpy).toHaveBeenCalledWith("hello");
    expect(warnSpy).toHaveBeenCalledWith("careful");
    expect(errorSpy).toHaveBeenCalledWith("broken", "");
  });

  test("should add level prefixes when requested", () => {
    const reporter = new ConsoleProgressReporter(true, true);
    const cause = new Error("boom");

    reporter.info("hello");
    reporter.error("broken", cause);
    reporter.debug("details", 42);

    expect(logSpy).toHaveBeenCalledWith("[INFO] hello");
    expect(errorSpy).toHaveBeenCalledWith("[ERROR] broken", cause);
    expect(debugSpy).toHaveBeenCalledWith("[DEBUG] details", 42);
  });

  test("should hide debug output and timers unless verbose", () => {
    const reporter = new ConsoleProgressReporter(false, true);

    reporter.debug("details");
    reporter.startOperation("op");

    expect(debugSpy).not.toHaveBeenCalled();
    expect(timeSpy).not.toHaveBeenCalled();
  });
});
