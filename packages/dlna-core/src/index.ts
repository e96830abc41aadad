// From logger.ts
export {
    default as createLogger,
    createModuleLogger,
    isModuleVisible,
} from './logger';
export type { CustomLogger } from './logger';

// From types.ts
export type * from './types';

// From errors.ts
export {
    FetchError,
    ParseError,
    ControlError,
    StreamingIOError,
} from './errors';
export type { ControlErrorDetails } from './errors';

// From ssdpDiscovery.ts
export {
    DEFAULT_SEARCH_TARGETS,
    discover,
    discoverIterable,
    rootDeviceUuid,
} from './ssdpDiscovery';

export {
    SSDP_MULTICAST_ADDRESS_IPV4,
    SSDP_PORT,
    buildMSearchMessage,
} from './ssdpSocketManager';

// From deviceDescription.ts
export {
    fetchDescription,
    resolveControlUrl,
    UNKNOWN_DEVICE_NAME,
} from './deviceDescription';

// From rendererCandidates.ts
export {
    findRendererCandidates,
    searchTargetRank,
} from './rendererCandidates';
export type { RendererSearchOptions, RendererSearchDependencies } from './rendererCandidates';

// From upnpSoapClient.ts
export {
    SoapControlClient,
    buildSoapEnvelope,
    parseActionResponse,
    parseUpnpFault,
} from './upnpSoapClient';

export {
    AVTransportClient,
    AV_TRANSPORT_SERVICE_TYPE,
} from './avTransportClient';

export {
    RenderingControlClient,
    RENDERING_CONTROL_SERVICE_TYPE,
} from './renderingControlClient';

// From didlLiteUtils.ts
export {
    buildMediaMetadata,
    createSingleItemDidlLiteXml,
    dlnaProfileFor,
    protocolInfoFor,
    upnpClassFor,
} from './didlLiteUtils';

// From mimeTypes.ts
export {
    DEFAULT_MEDIA_MIME_TYPE,
    getMimeType,
    guessMediaMimeType,
    lookupMimeType,
} from './mimeTypes';

// From utils.ts
export {
    errorCode,
    errorMessage,
    escapeXml,
    extractTagValue,
    formatTime,
    hhmmssToSeconds,
    secondsToHhmmss,
} from './utils';
