export {
  audioMimeType,
  isAudioFile,
  loadAudioFile,
  type AudioFile,
} from "./audio";
export {
  createVoiceApiClient,
  DEFAULT_VOICE_API_PATHS,
  unwrap,
  VOICE_API_ENDPOINTS,
  type VoiceApiClient,
  type VoiceApiClientConfig,
  type VoiceApiEndpoint,
  type VoiceApiPaths,
} from "./client";
export type {
  DeepfakeLabel,
  DeepfakeResult,
  MfaResult,
  SarDecision,
  SarReport,
  SarResult,
} from "./schemas";
