import { NO_UPDATE, type PriorOutput } from "../contracts/component";

/**
 * Carries the artifact forward: a "no update" artifact takes the first
 * non-empty, non-sentinel artifact from the prior outputs, in chain order.
 */
export function resolveArtifact(
  artifact: string,
  priorOutputs: ReadonlyArray<Pick<PriorOutput, "artifact">>
): string {
  if (artifact !== NO_UPDATE) return artifact;
  for (const prior of priorOutputs) {
    if (prior.artifact && prior.artifact !== NO_UPDATE) {
      return prior.artifact;
    }
  }
  return NO_UPDATE;
}
