import chalk from "chalk";
import { vi } from "vitest";

vi.mock("../../utils/manager-factory");

import { createMemoryManager, mockConfig } from "../../__tests__/test-utils";
import { ConfigLoader } from "../../config/loader";
import * as managerFactory from "../../utils/manager-factory";
import { revokeCommand } from "../revoke";
import { revokeUserCommand } from "../revoke-user";

const mockCreateTokenManager = vi.mocked(managerFactory.createTokenManager);
const mockResolve = vi.spyOn(ConfigLoader.prototype, "resolve");
const consoleLogSpy = vi.spyOn(console, "log");
const consoleWarnSpy = vi.spyOn(console, "warn");

beforeEach(() => {
  vi.clearAllMocks();
  mockResolve.mockResolvedValue(mockConfig);
  consoleLogSpy.mockImplementation(() => undefined);
  consoleWarnSpy.mockImplementation(() => undefined);
});

describe("revokeCommand", () => {
  it("revokes an existing token", async () => {
    const { manager, store } = createMemoryManager();
    mockCreateTokenManager.mockReturnValue(manager);
    const { token } = await manager.issue({ user_id: 7 });

    await revokeCommand({ token }, {});

    expect(store.size).toBe(0);
    expect(consoleLogSpy).toHaveBeenCalledWith(
      chalk.green(`Token ${token.slice(0, 8)}... revoked successfully`),
    );
  });

  it("warns when the token does not exist", async () => {
    const { manager } = createMemoryManager();
    mockCreateTokenManager.mockReturnValue(manager);

    await revokeCommand({ token: "cd".repeat(32) }, {});

    expect(consoleWarnSpy).toHaveBeenCalledWith(
      chalk.yellow("Token cdcdcdcd... not found"),
    );
  });
});

describe("revokeUserCommand", () => {
  it("revokes every token of the user", async () => {
    const { manager, store } = createMemoryManager();
    mockCreateTokenManager.mockReturnValue(manager);
    await manager.issue({ user_id: 7 });
    await manager.issue({ user_id: "7" });
    await manager.issue({ user_id: 8 });

    await revokeUserCommand({ userId: "7" }, {});

    expect(store.size).toBe(1);
    expect(consoleLogSpy).toHaveBeenCalledWith(
      chalk.green("Revoked 2 token(s) for user 7"),
    );
  });

  it("prints JSON when asked", async () => {
    const { manager } = createMemoryManager();
    mockCreateTokenManager.mockReturnValue(manager);

    await revokeUserCommand({ userId: "42", json: true }, {});

    expect(consoleLogSpy).toHaveBeenCalledWith(
      JSON.stringify({ userId: "42", revoked: 0 }, null, 2),
    );
  });
});
