import { describe, expect, it, vi } from "vitest";
import { ConflictError, StorageUnavailableError } from "../errors";
import { withStorageRetry } from "../retry";

const options = { attempts: 3, baseDelayMs: 0 };

describe("withStorageRetry", () => {
  it("retries StorageUnavailableError until the task succeeds", async () => {
    const task = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new StorageUnavailableError("down"))
      .mockResolvedValueOnce("saved");
    const onRetry = vi.fn();

    await expect(withStorageRetry(task, options, onRetry)).resolves.toBe("saved");
    expect(task).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0][0]).toBe(1);
  });

  it("gives up after the configured number of attempts", async () => {
    const task = vi.fn(async () => {
      throw new StorageUnavailableError("down");
    });

    await expect(withStorageRetry(task, options)).rejects.toBeInstanceOf(StorageUnavailableError);
    expect(task).toHaveBeenCalledTimes(3);
  });

  it("passes any other error straight through", async () => {
    const task = vi.fn(async () => {
      throw new ConflictError("moved");
    });

    await expect(withStorageRetry(task, options)).rejects.toBeInstanceOf(ConflictError);
    expect(task).toHaveBeenCalledTimes(1);
  });

  it("always makes at least one attempt", async () => {
    const task = vi.fn(async () => 7);
    await expect(withStorageRetry(task, { attempts: 0, baseDelayMs: 0 })).resolves.toBe(7);
  });
});
