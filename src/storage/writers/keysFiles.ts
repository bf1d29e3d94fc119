import { keysFilePath, renderKeysFile } from "../../keys/keysFile";
import type { CommitteeRecord } from "../../stores/interfaces";
import type { KeysFileArtifact } from "../capabilities";
import type { CapabilityScope } from "../context";
import { exception, result, type Outcome } from "../outcome";

/**
 * Stages a fresh KEYS listing for the committee. Database faults raise;
 * filesystem faults come back as an exception outcome so the caller can
 * keep its primary result. The committee row stays locked until the session
 * ends, so concurrent sessions render the listing one after another.
 */
export async function regenerateKeysFile(
  scope: CapabilityScope,
  committee: CommitteeRecord
): Promise<Outcome<KeysFileArtifact>> {
  const { ctx } = scope;

  let destination: string;
  try {
    destination = keysFilePath(ctx.stateDir, committee.name);
  } catch (error) {
    return exception(error);
  }

  return ctx.mediate({ action: "keys_file.regenerate", subject: committee.name, scope }, async () => {
    const tx = ctx.tx();
    await tx.committees.lock(committee.name);
    const keys = await tx.keys.listForCommittee(committee.name);
    const artifact: KeysFileArtifact = { committee: committee.name, path: destination, keyCount: keys.length };
    try {
      await ctx.artifacts.stage(destination, renderKeysFile({ committee, keys, generatedAt: ctx.now() }));
    } catch (error) {
      return exception(error, artifact);
    }
    return result(artifact);
  });
}
