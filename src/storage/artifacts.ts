import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import type { Logger } from "../config/logger";
import { DomainError } from "../types/errors";
import { capture, exception, Outcomes } from "./outcome";

/**
 * Filesystem writes made during a Storage Session. Content is written to a
 * staged file next to its destination and only renamed into place once the
 * database transaction has committed.
 */
export class ArtifactStaging {
  private readonly staged = new Map<string, string>();

  constructor(private readonly logger: Logger) {}

  get pendingCount(): number {
    return this.staged.size;
  }

  pendingDestinations(): string[] {
    return [...this.staged.keys()];
  }

  async stage(destination: string, content: string): Promise<void> {
    const stagedPath = `${destination}.${crypto.randomUUID()}.staged`;
    try {
      await fs.mkdir(path.dirname(destination), { recursive: true });
      await fs.writeFile(stagedPath, content, "utf8");
    } catch (error) {
      throw new DomainError("ARTIFACT_WRITE_FAILED", `could not stage ${destination}`, {
        cause: error instanceof Error ? error.message : String(error),
      });
    }
    const previous = this.staged.get(destination);
    this.staged.set(destination, stagedPath);
    if (previous) {
      await fs.rm(previous, { force: true });
    }
  }

  /** Renames every staged file into place. Outcomes are keyed by destination path. */
  async publish(): Promise<Outcomes<string>> {
    const outcomes = new Outcomes<string>();
    for (const [destination, stagedPath] of this.takeAll()) {
      const outcome = await capture(async () => {
        await fs.rename(stagedPath, destination);
        return destination;
      });
      if (outcome.kind === "exception") {
        this.logger.error("artifact_publish_failed", { destination, message: outcome.error.message });
        await fs.rm(stagedPath, { force: true });
        outcomes.set(
          destination,
          exception<string>(
            new DomainError("ARTIFACT_WRITE_FAILED", `could not publish ${destination}`, {
              cause: outcome.error.message,
            })
          )
        );
        continue;
      }
      outcomes.set(destination, outcome);
    }
    return outcomes;
  }

  async discard(): Promise<void> {
    for (const [destination, stagedPath] of this.takeAll()) {
      await fs.rm(stagedPath, { force: true });
      this.logger.debug("artifact_discarded", { destination });
    }
  }

  private takeAll(): Array<[string, string]> {
    const entries = [...this.staged.entries()];
    this.staged.clear();
    return entries;
  }
}
