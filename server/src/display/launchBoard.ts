import type { LaunchAttributes } from './launchDisplay';

/** Destination des attributs calculés (le « device » vu par le dashboard). */
export interface AttributeSink {
  publish(attributes: LaunchAttributes): void;
}

export interface BoardSnapshot {
  attributes: LaunchAttributes | null;
  publishedAt: number | null;
}

export class LaunchBoard implements AttributeSink {
  private attributes: LaunchAttributes | null = null;
  private publishedAt: number | null = null;

  constructor(private readonly now: () => number = Date.now) {}

  publish(attributes: LaunchAttributes): void {
    this.attributes = attributes;
    this.publishedAt = this.now();
  }

  snapshot(): BoardSnapshot {
    return { attributes: this.attributes, publishedAt: this.publishedAt };
  }
}
