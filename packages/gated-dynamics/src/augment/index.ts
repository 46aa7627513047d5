export { type Rng, createRng, gaussian, randomInt, deriveSeed } from "./rng";
export {
  type ChannelBounds,
  type AugmenterConfig,
  type AugmentationPlan,
  type AugmentationResult,
  defaultAugmenterConfig,
  EpisodeAugmenter,
} from "./augmenter";
