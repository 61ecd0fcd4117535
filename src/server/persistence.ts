import { type Logger } from "winston";
import * as config from "./config.ts";
import {
  type CoverController,
  type PersistedCoverAttributes,
} from "./cover-controller.ts";

// The subset of node-persist used here.
export interface CoverStore {
  getItem(key: string): Promise<unknown>;
  setItem(key: string, value: string): Promise<unknown>;
}

export function storageKey(coverId: string): string {
  return `${config.COVER_KEY_PREFIX}${coverId}`;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value)
    ? value
    : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalBoolean(value: unknown): boolean | undefined {
  return typeof value === "boolean" ? value : undefined;
}

export function parsePersisted(data: string): PersistedCoverAttributes | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) {
    return null;
  }
  return {
    position: optionalNumber(parsed.position),
    lastKnownPosition: optionalNumber(parsed.lastKnownPosition),
    tmpPosition: optionalNumber(parsed.tmpPosition),
    isOpening: optionalBoolean(parsed.isOpening),
    isClosing: optionalBoolean(parsed.isClosing),
    closed: optionalBoolean(parsed.closed),
    tiltPosition: optionalNumber(parsed.tiltPosition),
    lastStatus:
      typeof parsed.lastStatus === "string" ? parsed.lastStatus : undefined,
  };
}

/**
 * Restore the persisted attributes of a cover, if any were saved.
 */
export async function restoreCover(
  storage: CoverStore,
  cover: CoverController,
  logger: Logger
): Promise<boolean> {
  const data = await storage.getItem(storageKey(cover.uniqueId));
  if (typeof data !== "string") {
    return false;
  }
  const attributes = parsePersisted(data);
  if (!attributes) {
    logger.error(`Failed to load persisted state of '${cover.name}'`);
    return false;
  }
  cover.restore(attributes);
  return true;
}

// Save the cover's attributes whenever its state changes.
export function trackCover(
  storage: CoverStore,
  cover: CoverController,
  logger: Logger
): void {
  cover.on("change", () => {
    storage
      .setItem(storageKey(cover.uniqueId), JSON.stringify(cover.toPersisted()))
      .catch((err: unknown) => {
        logger.error(
          `Failed to persist state of '${cover.name}': ${
            err instanceof Error ? err.message : String(err)
          }`
        );
      });
  });
}
