export { isAcceptedRelease, reduceReleases, releaseKey } from './release_reducer';
