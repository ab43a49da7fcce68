import type { RuntimeClient, UsageCategory, UsageDelta, UsageSnapshot } from "./types";
import { USAGE_CATEGORIES } from "./types";

/** Before/after disk usage for operator feedback. Classification never reads it. */
export class UsageReporter {
  constructor(private readonly client: RuntimeClient) {}

  report(): Promise<UsageSnapshot> {
    return this.client.usage();
  }

  diff(before: UsageSnapshot, after: UsageSnapshot): UsageDelta {
    const freedBytes: Record<UsageCategory, number | undefined> = {
      images: undefined,
      containers: undefined,
      volumes: undefined,
      buildCache: undefined
    };
    let totalFreedBytes = 0;

    for (const category of USAGE_CATEGORIES) {
      const previous = before.entries[category].sizeBytes;
      const current = after.entries[category].sizeBytes;
      if (previous === undefined || current === undefined) continue;
      const freed = Math.max(0, previous - current);
      freedBytes[category] = freed;
      totalFreedBytes += freed;
    }

    return { freedBytes, totalFreedBytes };
  }
}
