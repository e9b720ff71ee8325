import { describe, it, expect, vi, afterEach } from "vitest";
import { getUserConfigPath } from "../../utils";
import { configCommand } from "./config";

describe("configCommand", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints the user config path on its own line", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    configCommand();

    expect(log).toHaveBeenNthCalledWith(2, `  ${getUserConfigPath()}`);
    expect(log).toHaveBeenCalledTimes(4);
  });
});
