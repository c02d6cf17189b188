import { configureLogger, createLogger } from "@/lib/logger";

describe("configureLogger", () => {
  afterEach(() => {
    configureLogger({ level: "silent", pretty: false });
  });

  it("applies the configured level to loggers created afterwards", () => {
    const root = configureLogger({ level: "warn", pretty: false });
    const child = createLogger("storage/sqlite");

    expect(root.level).toBe("warn");
    expect(child.level).toBe("warn");
    expect(child.isLevelEnabled("info")).toBe(false);
    expect(child.isLevelEnabled("error")).toBe(true);
  });

  it("replaces the root logger on every call", () => {
    const first = configureLogger({ level: "debug", pretty: false });
    const second = configureLogger({ level: "error", pretty: false });

    expect(second).not.toBe(first);
    expect(createLogger().level).toBe("error");
  });
});
