import { describe, it, expect, vi } from "vitest";
import { createCover, createLogger } from "../../test/helpers.ts";
import {
  type CoverStore,
  parsePersisted,
  restoreCover,
  storageKey,
  trackCover,
} from "./persistence.ts";

class MemoryStore implements CoverStore {
  items = new Map<string, string>();

  async getItem(key: string): Promise<unknown> {
    return this.items.get(key);
  }

  async setItem(key: string, value: string): Promise<unknown> {
    this.items.set(key, value);
    return value;
  }
}

describe("parsePersisted", () => {
  it("keeps well-typed attributes and drops the rest", () => {
    expect(
      parsePersisted(
        JSON.stringify({ position: 30, closed: "yes", lastStatus: "moving_up" })
      )
    ).toEqual({
      position: 30,
      lastKnownPosition: undefined,
      tmpPosition: undefined,
      isOpening: undefined,
      isClosing: undefined,
      closed: undefined,
      tiltPosition: undefined,
      lastStatus: "moving_up",
    });
  });

  it("rejects malformed data", () => {
    expect(parsePersisted("{not json")).toBeNull();
    expect(parsePersisted("[1, 2]")).toBeNull();
  });
});

describe("restoreCover", () => {
  it("does nothing when no state was saved", async () => {
    const { cover } = createCover();
    const store = new MemoryStore();

    expect(await restoreCover(store, cover, createLogger())).toBe(false);
    expect(cover.state).toBe("unknown");
  });

  it("restores saved attributes with defaults for missing ones", async () => {
    const { cover } = createCover();
    const store = new MemoryStore();
    store.items.set(
      "cover_test-serial_3",
      JSON.stringify({ position: 30, closed: true })
    );

    expect(await restoreCover(store, cover, createLogger())).toBe(true);
    expect(cover.position).toBe(30);
    expect(cover.lastKnownPosition).toBe(50);
    expect(cover.state).toBe("closed");
  });

  it("logs and skips unreadable state", async () => {
    const { cover } = createCover();
    const logger = createLogger();
    const error = vi.spyOn(logger, "error");
    const store = new MemoryStore();
    store.items.set(storageKey(cover.uniqueId), "{broken");

    expect(await restoreCover(store, cover, logger)).toBe(false);
    expect(error).toHaveBeenCalledWith(
      "Failed to load persisted state of 'Test Cover'"
    );
  });
});

describe("trackCover", () => {
  it("saves the attributes on every change", () => {
    const { cover } = createCover();
    const store = new MemoryStore();
    trackCover(store, cover, createLogger());

    cover.open();

    const saved = store.items.get("cover_test-serial_3");
    expect(saved).toBeDefined();
    expect(JSON.parse(saved ?? "{}")).toMatchObject({
      position: 100,
      isOpening: true,
      isClosing: false,
      closed: false,
      tiltPosition: 50,
    });
    cover.dispose();
  });

  it("logs a failed write", async () => {
    const { cover } = createCover();
    const logger = createLogger();
    const error = vi.spyOn(logger, "error");
    const store: CoverStore = {
      getItem: async () => undefined,
      setItem: () => Promise.reject(new Error("disk full")),
    };
    trackCover(store, cover, logger);

    cover.stop();

    await vi.waitFor(() => {
      expect(error).toHaveBeenCalledWith(
        "Failed to persist state of 'Test Cover': disk full"
      );
    });
  });
});
