/**
 * Guest Module - Public API
 *
 * @module guest
 */

export {
  DEFAULT_CONV_OFFSET,
  DEFAULT_DOT_SHIFT,
  GUEST_TEMPLATES,
  isGuestTemplate,
  resolveStack,
  resolveWeightsLocation,
  resolveGuestTemplate,
  computeGuestConfig,
  type GuestTemplate,
  type StackLayout,
  type WeightsLocation,
  type LinearGuest,
  type SoftmaxGuest,
  type MlpGuest,
  type DeepMlpGuest,
  type Cnn1dGuest,
  type TinyCnnGuest,
  type TwoTowerGuest,
  type TreeGuest,
  type CustomGuest,
  type GuestModel,
  type GuestConfig,
  type GuestConfigOptions,
} from './config.js';

export { renderGuestConstants, guestConfigPath, writeGuestConfig } from './render.js';
