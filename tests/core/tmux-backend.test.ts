import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { parseEnvironment, TmuxBackend } from "../../src/core/sessions/tmux-backend.js";
import { SessionNotFoundError } from "../../src/infra/errors.js";
import { runCommand } from "../../src/infra/process.js";
import { silenceLogger } from "../helpers.js";

vi.mock("../../src/infra/process.js", () => ({
  runCommand: vi.fn(),
}));

const mockedRun = vi.mocked(runCommand);

function result(code: number, stdout = "", stderr = "") {
  return { code, stdout, stderr };
}

describe("parseEnvironment", () => {
  it("should parse set variables and skip removed ones", () => {
    const output = ["SESSIONGATE_WORKSPACE=/w/api", "-DISPLAY", "URL=https://x.test/?a=b", "", "junk"].join("\n");

    expect(parseEnvironment(output)).toEqual({
      SESSIONGATE_WORKSPACE: "/w/api",
      URL: "https://x.test/?a=b",
    });
  });
});

describe("TmuxBackend", () => {
  const tmux = new TmuxBackend("tmux");

  beforeEach(() => {
    silenceLogger();
    mockedRun.mockReset();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should list session names", async () => {
    mockedRun.mockResolvedValue(result(0, "one\ntwo\n"));

    expect(await tmux.listSessions()).toEqual(["one", "two"]);
    expect(mockedRun).toHaveBeenCalledWith("tmux", ["list-sessions", "-F", "#{session_name}"], {
      timeoutMs: 10_000,
    });
  });

  it("should list nothing when no server is running", async () => {
    mockedRun.mockResolvedValue(result(1, "", "no server running on /tmp/tmux-0/default"));
    expect(await tmux.listSessions()).toEqual([]);
  });

  it("should list nothing when tmux is not installed", async () => {
    mockedRun.mockRejectedValue(new Error("spawn tmux ENOENT"));
    expect(await tmux.listSessions()).toEqual([]);
  });

  it("should read the session environment", async () => {
    mockedRun.mockResolvedValue(result(0, "SESSIONGATE_POLL_CONFIG=acme/api\n"));

    expect(await tmux.getEnvironment("s1")).toEqual({ SESSIONGATE_POLL_CONFIG: "acme/api" });
    expect(mockedRun).toHaveBeenCalledWith("tmux", ["show-environment", "-t", "s1"], { timeoutMs: 10_000 });
  });

  it("should raise SessionNotFoundError for a vanished session", async () => {
    mockedRun.mockResolvedValue(result(1, "", "can't find session: s1"));

    await expect(tmux.getEnvironment("s1")).rejects.toBeInstanceOf(SessionNotFoundError);
    await expect(tmux.killSession("s1")).rejects.toBeInstanceOf(SessionNotFoundError);
  });

  it("should parse the creation time or fall back to 0", async () => {
    mockedRun.mockResolvedValueOnce(result(0, "1700000000\n"));
    expect(await tmux.getCreated("s1")).toBe(1_700_000_000);

    mockedRun.mockResolvedValueOnce(result(0, "\n"));
    expect(await tmux.getCreated("s1")).toBe(0);
  });

  it("should report session existence from the exit code", async () => {
    mockedRun.mockResolvedValueOnce(result(0));
    expect(await tmux.hasSession("s1")).toBe(true);

    mockedRun.mockResolvedValueOnce(result(1));
    expect(await tmux.hasSession("s2")).toBe(false);
  });
});
