export { Queue } from './Queue';
export { sameTrack, sameTracks, sameSnapshot } from './tracks';
