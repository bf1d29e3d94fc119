import type { CommitteeUpload, KeyDeletion, KeysFileArtifact } from "./capabilities";
import { exception, Outcomes, result, warning, type Outcome } from "./outcome";

/*
 * Writers report a KEYS file as soon as it is staged. Whether it reached its
 * destination is only known after commit, so these fold the publish outcomes
 * of a session back into what the writers returned.
 */

export function settleKeysFile(
  outcome: Outcome<KeysFileArtifact>,
  published: Outcomes<string>
): Outcome<KeysFileArtifact> {
  if (outcome.kind === "exception") return outcome;
  const publication = published.get(outcome.value.path);
  if (publication?.kind !== "exception") return outcome;
  return exception(publication.error, outcome.value);
}

export function settleKeysFiles(
  outcomes: Outcomes<KeysFileArtifact>,
  published: Outcomes<string>
): Outcomes<KeysFileArtifact> {
  const settled = new Outcomes<KeysFileArtifact>();
  for (const [committee, outcome] of outcomes) {
    settled.set(committee, settleKeysFile(outcome, published));
  }
  return settled;
}

/** A KEYS file that failed to publish downgrades its parent result to a warning. */
export function settleWithKeysFile<T extends { keysFile: Outcome<KeysFileArtifact> }>(
  outcome: Outcome<T>,
  published: Outcomes<string>
): Outcome<T> {
  if (outcome.kind === "exception") return outcome;
  const keysFile = settleKeysFile(outcome.value.keysFile, published);
  if (keysFile === outcome.value.keysFile || keysFile.kind !== "exception") return outcome;
  const value: T = { ...outcome.value, keysFile };
  return warning(value, outcome.kind === "warning" ? outcome.warning : keysFile.error);
}

export function settleDeletion(outcome: Outcome<KeyDeletion>, published: Outcomes<string>): Outcome<KeyDeletion> {
  if (outcome.kind === "exception") return outcome;
  const keysFiles = settleKeysFiles(outcome.value.keysFiles, published);
  const value: KeyDeletion = { ...outcome.value, keysFiles };
  if (outcome.kind === "warning") return warning(value, outcome.warning);
  const firstFailure = keysFiles.exceptions()[0];
  return firstFailure ? warning(value, firstFailure) : result(value);
}

export function settleUpload(upload: CommitteeUpload, published: Outcomes<string>): CommitteeUpload {
  return { keys: upload.keys, keysFile: upload.keysFile ? settleKeysFile(upload.keysFile, published) : null };
}
