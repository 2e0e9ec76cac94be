import { vi } from "vitest";

const { mockPathExists, mockReadFile } = vi.hoisted(() => ({
  mockPathExists: vi.fn<(path: string) => Promise<boolean>>(),
  mockReadFile: vi.fn<(path: string, encoding: string) => Promise<string>>(),
}));

vi.mock("fs-extra", () => ({
  pathExists: mockPathExists,
  readFile: mockReadFile,
}));

const { mockHomedir } = vi.hoisted(() => ({
  mockHomedir: vi.fn<() => string>(),
}));

vi.mock("os", async (importOriginal) => ({
  ...(await importOriginal<typeof import("os")>()),
  homedir: mockHomedir,
}));

import { ConfigLoader } from "../loader";

const fileConfig = `
tableName: file-table
endpoint: http://file-dynamodb:8000
region: eu-west-1
ttlSeconds: 600
renewThresholdSeconds: 60
`;

describe("ConfigLoader", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe("loadUserConfig", () => {
    it("reads config.yaml from the config directory", async () => {
      mockPathExists.mockResolvedValue(false);

      await new ConfigLoader("/test/config", {}).loadUserConfig();

      expect(mockPathExists).toHaveBeenCalledWith("/test/config/config.yaml");
    });

    it("defaults to a directory under the home directory", async () => {
      mockHomedir.mockReturnValue("/home/testuser");
      mockPathExists.mockResolvedValue(false);

      await new ConfigLoader(undefined, {}).loadUserConfig();

      expect(mockPathExists).toHaveBeenCalledWith(
        "/home/testuser/.session-tokens/config.yaml",
      );
    });

    it("returns null when the file does not exist", async () => {
      mockPathExists.mockResolvedValue(false);

      expect(await new ConfigLoader("/test/config", {}).loadUserConfig()).toBeNull();
      expect(mockReadFile).not.toHaveBeenCalled();
    });

    it("parses the YAML file", async () => {
      mockPathExists.mockResolvedValue(true);
      mockReadFile.mockResolvedValue(fileConfig);

      expect(
        await new ConfigLoader("/test/config", {}).loadUserConfig(),
      ).toStrictEqual({
        tableName: "file-table",
        endpoint: "http://file-dynamodb:8000",
        region: "eu-west-1",
        ttlSeconds: 600,
        renewThresholdSeconds: 60,
      });
      expect(mockReadFile).toHaveBeenCalledWith(
        "/test/config/config.yaml",
        "utf-8",
      );
    });

    it("treats an empty file as an empty config", async () => {
      mockPathExists.mockResolvedValue(true);
      mockReadFile.mockResolvedValue("");

      expect(
        await new ConfigLoader("/test/config", {}).loadUserConfig(),
      ).toStrictEqual({});
    });

    it("rejects an invalid file", async () => {
      mockPathExists.mockResolvedValue(true);
      mockReadFile.mockResolvedValue("ttlSeconds: five\n");

      await expect(
        new ConfigLoader("/test/config", {}).loadUserConfig(),
      ).rejects.toThrow("Invalid config at /test/config/config.yaml");
    });
  });

  describe("resolve", () => {
    it("uses defaults when nothing is configured", async () => {
      mockPathExists.mockResolvedValue(false);

      expect(await new ConfigLoader("/test/config", {}).resolve({})).toStrictEqual(
        {
          tableName: "session-tokens",
          endpoint: undefined,
          region: "us-east-1",
          ttlSeconds: 300,
          renewThresholdSeconds: 30,
          secret: "local_secret",
        },
      );
    });

    it("uses the config file over defaults", async () => {
      mockPathExists.mockResolvedValue(true);
      mockReadFile.mockResolvedValue(fileConfig);

      expect(await new ConfigLoader("/test/config", {}).resolve({})).toStrictEqual(
        {
          tableName: "file-table",
          endpoint: "http://file-dynamodb:8000",
          region: "eu-west-1",
          ttlSeconds: 600,
          renewThresholdSeconds: 60,
          secret: "local_secret",
        },
      );
    });

    it("uses the environment over the config file", async () => {
      mockPathExists.mockResolvedValue(true);
      mockReadFile.mockResolvedValue(fileConfig);

      const loader = new ConfigLoader("/test/config", {
        TOKEN_TABLE_NAME: "env-table",
        DYNAMODB_ENDPOINT: "http://env-dynamodb:8000",
        AWS_REGION: "us-west-2",
        TOKEN_TTL_SECONDS: "900",
        TOKEN_SECRET: "test-secret",
      });

      expect(await loader.resolve({})).toStrictEqual({
        tableName: "env-table",
        endpoint: "http://env-dynamodb:8000",
        region: "us-west-2",
        ttlSeconds: 900,
        renewThresholdSeconds: 60,
        secret: "test-secret",
      });
    });

    it("keeps file lifetimes when the environment values are not integers", async () => {
      mockPathExists.mockResolvedValue(true);
      mockReadFile.mockResolvedValue(fileConfig);

      const loader = new ConfigLoader("/test/config", {
        TOKEN_TTL_SECONDS: "abc",
        TOKEN_RENEW_THRESHOLD_SECONDS: "1.5",
      });

      expect(await loader.resolve({})).toMatchObject({
        ttlSeconds: 600,
        renewThresholdSeconds: 60,
      });
    });

    it("uses options over the environment", async () => {
      mockPathExists.mockResolvedValue(false);

      const loader = new ConfigLoader("/test/config", {
        TOKEN_TABLE_NAME: "env-table",
        AWS_REGION: "us-west-2",
      });

      expect(
        await loader.resolve({
          table: "option-table",
          endpoint: "http://localhost:8000",
          region: "ap-south-1",
        }),
      ).toMatchObject({
        tableName: "option-table",
        endpoint: "http://localhost:8000",
        region: "ap-south-1",
      });
    });
  });
});
