import type { IAnalyticsMetadataProvider } from '@session-guard/models';

/**
 * Analytics metadata holder kept in memory.
 *
 * Whatever was last passed to `update` is attached to every request until
 * `clear` is called. Records are serialized as JSON.
 * @public
 */
export class InMemoryAnalyticsMetadataProvider implements IAnalyticsMetadataProvider {
  private metadata?: string;

  public constructor(initial?: string | Record<string, unknown>) {
    if (initial !== undefined) {
      this.update(initial);
    }
  }

  public update(metadata: string | Record<string, unknown>): void {
    this.metadata = typeof metadata === 'string' ? metadata : JSON.stringify(metadata);
  }

  public clear(): void {
    this.metadata = undefined;
  }

  public currentAnalyticsMetadata(): string | undefined {
    return this.metadata;
  }
}
