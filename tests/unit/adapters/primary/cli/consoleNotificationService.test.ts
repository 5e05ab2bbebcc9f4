import { ConsoleNotificationService } from "../../../../../src/adapters/primary/cli/services/consoleNotificationService";

describe("ConsoleNotificationService", () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  test("should mark warnings and errors", () => {
    const log = jest.spyOn(console, "log").mockImplementation(() => undefined);
    const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    const error = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const service = new ConsoleNotificationService();

    service.showInformation("done");
    service.showWarning("1 path(s) excluded by pattern");
    service.showError("Build failed.");

    expect(log).toHaveBeenCalledWith("done");
    expect(warn).toHaveBeenCalledWith("⚠️  1 path(s) excluded by pattern");
    expect(error).toHaveBeenCalledWith("❌ Build failed.");
  });
});
