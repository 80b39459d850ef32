import type { SourceSettings } from '../config/launchConfig';
import { LaunchLibrarySource } from './launchLibraryClient';
import type { LaunchSource } from './launchSource';
import { SpacexLaunchSource } from './spacexClient';

export function createLaunchSource(settings: SourceSettings): LaunchSource {
  switch (settings.kind) {
    case 'spacex-v4':
      return new SpacexLaunchSource(settings);
    case 'launch-library':
      return new LaunchLibrarySource(settings);
  }
}
