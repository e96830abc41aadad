// נקודת הכניסה של חבילת השרת: הגדרות, שרת ההזרמה וסשן הניגון
export { config, applyEnvOverrides } from './config';
export type { AppConfig, ConfigTree } from './config';
export { loadEnvFile } from './envLoader';
export { detectOutboundAddress, FALLBACK_ADDRESS } from './localAddress';
export { parseRangeHeader, contentRange } from './rangeRequest';
export type { RangeResolution } from './rangeRequest';
export { serveDirectory, resolveRequestPath, isClientDisconnect } from './rangeHttpServer';
export type { RangeHttpServer, ServeDirectoryOptions, SocketTuningOptions } from './rangeHttpServer';
export { searchRenderers } from './rendererSearch';
export type { RendererSearchHooks } from './rendererSearch';
export { PlaybackSession, mimeTypeForContainer } from './playbackSession';
export type {
  AvTransportController,
  PlaybackProgress,
  PlaybackSessionOptions,
  PlaybackState,
  RenderingController,
  StartPlaybackOptions,
} from './playbackSession';
