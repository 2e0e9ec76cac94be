import chalk from "chalk";
import { vi } from "vitest";

vi.mock("../../utils/manager-factory");

import { createMemoryManager, issuedAt, mockConfig } from "../../__tests__/test-utils";
import { ConfigLoader } from "../../config/loader";
import * as managerFactory from "../../utils/manager-factory";
import { issueCommand } from "../issue";

const mockCreateTokenManager = vi.mocked(managerFactory.createTokenManager);
const mockResolve = vi.spyOn(ConfigLoader.prototype, "resolve");
const consoleLogSpy = vi.spyOn(console, "log");

beforeEach(() => {
  vi.clearAllMocks();
  vi.useFakeTimers({ toFake: ["Date"] });
  vi.setSystemTime(issuedAt * 1000);
  mockResolve.mockResolvedValue(mockConfig);
  consoleLogSpy.mockImplementation(() => undefined);
});

afterEach(() => {
  vi.useRealTimers();
});

describe("issueCommand", () => {
  it("issues a token and prints it with its expiry", async () => {
    const { manager } = createMemoryManager();
    mockCreateTokenManager.mockReturnValue(manager);

    await issueCommand({ payload: '{"user_id": 7}', table: "test-table" }, {});

    expect(mockResolve).toHaveBeenCalledWith({
      payload: '{"user_id": 7}',
      table: "test-table",
    });
    expect(mockCreateTokenManager).toHaveBeenCalledWith(
      mockConfig,
      expect.anything(),
    );

    const lines = consoleLogSpy.mock.calls.map((args) => String(args[0]));
    expect(lines[0]).toBe(chalk.green("Token issued successfully!"));
    expect(lines[2]).toBe(
      "TOKEN (save this securely, it won't be shown again):",
    );
    expect(lines[3]).toMatch(/^[0-9a-f]{64}$/);
    expect(lines[5]).toBe("Expires at: 2023-11-14T22:18:20.000Z");

    const result = await manager.validate(lines[3]);
    expect(result).toMatchObject({ valid: true, record: { payload: { user_id: 7 } } });
  });

  it("prints JSON when asked", async () => {
    const { manager, store } = createMemoryManager();
    mockCreateTokenManager.mockReturnValue(manager);

    await issueCommand({ payload: "null", json: true }, {});

    expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    const output: unknown = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
    expect(output).toStrictEqual({
      token: expect.stringMatching(/^[0-9a-f]{64}$/),
      expiresAt: issuedAt + 300,
    });
    expect(store.size).toBe(1);
  });

  it("rejects a payload that is not JSON before connecting", async () => {
    await expect(issueCommand({ payload: "{oops" }, {})).rejects.toThrow(
      "Payload is not valid JSON",
    );
    expect(mockResolve).not.toHaveBeenCalled();
    expect(mockCreateTokenManager).not.toHaveBeenCalled();
  });
});
