import { isReservedNetwork } from "./docker";
import type { CleanupCandidateSet, ResourceHandle, ResourceType } from "./types";

export interface ClassifyOptions {
  /** Also offer tagged images that no container references. */
  aggressive?: boolean;
}

export function isRemovable(handle: ResourceHandle, options: ClassifyOptions = {}): boolean {
  switch (handle.type) {
    case "containers":
      return handle.status === "exited" || handle.status === "created";
    case "volumes":
      return handle.status === "dangling";
    case "networks":
      return (
        handle.status === "unused" &&
        handle.endpoints === 0 &&
        !handle.builtIn &&
        !isReservedNetwork(handle.name)
      );
    case "images":
      if (handle.status !== "dangling") return false;
      return options.aggressive === true || !handle.tagged;
  }
}

export function candidateLabel(type: ResourceType, options: ClassifyOptions = {}): string {
  switch (type) {
    case "containers":
      return "Stopped containers";
    case "volumes":
      return "Dangling volumes";
    case "networks":
      return "Unused networks";
    case "images":
      return options.aggressive ? "Unused images" : "Dangling images";
  }
}

export function classify(
  type: ResourceType,
  handles: readonly ResourceHandle[],
  options: ClassifyOptions = {}
): CleanupCandidateSet {
  return {
    type,
    label: candidateLabel(type, options),
    items: handles.filter((handle) => handle.type === type && isRemovable(handle, options))
  };
}
