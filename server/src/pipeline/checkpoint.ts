import path from "node:path";
import { z } from "zod";
import { nowIso, tryReadJsonFile, writeJsonFile } from "./utils.js";

const CheckpointFileSchema = z.object({
  name: z.string(),
  updatedAt: z.string(),
  units: z.record(z.string())
});

/**
 * Unit-level progress inside one expensive stage (one unit per section). A resumed stage
 * skips units already recorded here.
 */
export class StageCheckpoint {
  private constructor(
    private readonly filePath: string,
    private readonly name: string,
    private readonly units: Map<string, string>
  ) {}

  static async open(runDir: string, name: string): Promise<StageCheckpoint> {
    const filePath = path.join(runDir, "checkpoints", `${name}.json`);
    const stored = await tryReadJsonFile(filePath, CheckpointFileSchema);
    return new StageCheckpoint(filePath, name, new Map(Object.entries(stored?.units ?? {})));
  }

  get size(): number {
    return this.units.size;
  }

  get(unit: string): string | null {
    return this.units.get(unit) ?? null;
  }

  async complete(unit: string, value: string): Promise<void> {
    this.units.set(unit, value);
    await writeJsonFile(this.filePath, { name: this.name, updatedAt: nowIso(), units: Object.fromEntries(this.units) });
  }
}
