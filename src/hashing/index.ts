/**
 * Identity hashing for audio/transcript pairs.
 */

export {
  hashAudioFile,
  hashTranscript,
  hashPair,
  computeSampleIdentity,
  computeIdentities,
  HashInputUnreadable,
  AUDIO_READ_CHUNK_BYTES,
  DEFAULT_AUDIO_READ_TIMEOUT_MS,
  SHA256_HEX_PATTERN,
  type HashAudioOptions,
  type ComputeIdentitiesOptions,
} from "./identity.js";
