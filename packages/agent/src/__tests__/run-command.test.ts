import { EventEmitter } from "events";
import { PassThrough } from "stream";
import { spawn } from "child_process";
import { runCommand } from "../utils/run-command";

jest.mock("child_process");

const spawnMock = jest.mocked(spawn);

function createChild() {
  const child = Object.assign(new EventEmitter(), {
    stdout: new PassThrough(),
    stderr: new PassThrough(),
  });
  spawnMock.mockReturnValue(child as never);
  return child;
}

async function flush(): Promise<void> {
  for (let i = 0; i < 3; i++) {
    await new Promise((resolve) => setImmediate(resolve));
  }
}

describe("runCommand", () => {
  afterEach(() => {
    jest.resetAllMocks();
  });

  it("should spawn the executable with its arguments", async () => {
    const child = createChild();

    const pending = runCommand(["netplan", "apply", "--debug"]);
    child.stdout.end();
    child.stderr.end();
    await flush();
    child.emit("close", 0);

    await expect(pending).resolves.toEqual({ exitCode: 0, output: "" });
    expect(spawnMock).toHaveBeenCalledWith("netplan", ["apply", "--debug"], { timeout: 120_000 });
  });

  it("should collect the output lines and exit code", async () => {
    const child = createChild();

    const pending = runCommand(["netplan", "apply"]);
    child.stdout.end("Error in network definition\nunknown key 'foo'\n");
    child.stderr.end();
    await flush();
    child.emit("close", 1);

    await expect(pending).resolves.toEqual({
      exitCode: 1,
      output: "Error in network definition\nunknown key 'foo'",
    });
  });

  it("should include stderr lines", async () => {
    const child = createChild();

    const pending = runCommand(["netplan", "apply"]);
    child.stdout.end();
    child.stderr.end("permission denied\n");
    await flush();
    child.emit("close", 78);

    await expect(pending).resolves.toEqual({ exitCode: 78, output: "permission denied" });
  });

  it("should reject when the process cannot be started", async () => {
    const child = createChild();

    const pending = runCommand(["netplan", "apply"]);
    child.emit("error", new Error("spawn netplan ENOENT"));

    await expect(pending).rejects.toThrow("spawn netplan ENOENT");
  });

  it("should reject an empty command", async () => {
    await expect(runCommand([])).rejects.toThrow("Cannot run an empty command");
    expect(spawnMock).not.toHaveBeenCalled();
  });
});
