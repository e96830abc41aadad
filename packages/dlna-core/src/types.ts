// טיפוסים משותפים לגילוי, בקרה וניתוח מדיה

// ==========================================================================================
// SSDP
// ==========================================================================================

/**
 * @hebrew התקן שנמצא בסבב גילוי SSDP אחד. קיים רק למשך הסבב ואינו נשמר.
 */
export interface DiscoveredDevice {
  /** כתובת מסמך התיאור (כותרת LOCATION) */
  location: string;
  /** ערך ה-ST שהניב את ההתאמה */
  searchTarget: string;
  /** USN: UUID של התקן השורש, ואופציונלית `::` וסוג שירות/התקן */
  uniqueServiceName: string;
  /** כותרת SERVER, למידע בלבד */
  server: string;
}

export interface DiscoveryOptions {
  /** זמן האזנה לכל יעד חיפוש, במילישניות. ברירת מחדל: 2000 */
  timeoutMs?: number;
  /** ערך MX בבקשת M-SEARCH. ברירת מחדל: 1 */
  mx?: number;
  searchTargets?: readonly string[];
  /** ביטול מוקדם; מחזיר את מה שנאסף עד כה */
  abortSignal?: AbortSignal;
  multicastAddress?: string;
  multicastPort?: number;
  /** TTL למולטיקאסט. ברירת מחדל: 2 */
  multicastTtl?: number;
  /** כתובת IPv4 של הממשק שממנו יוצא המולטיקאסט. בלי ערך, מערכת ההפעלה בוחרת */
  multicastInterface?: string;
}

// ==========================================================================================
// Device description
// ==========================================================================================

export interface DeviceDescription {
  readonly friendlyName: string;
  readonly avTransportControlUrl?: string;
  readonly renderingControlControlUrl?: string;
}

export interface FetchDescriptionOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * @hebrew התקן עם שירות AVTransport, יחד עם התיאור שלו.
 */
export interface RendererCandidate {
  device: DiscoveredDevice;
  description: DeviceDescription;
}

// ==========================================================================================
// SOAP
// ==========================================================================================

/** ארגומנט פעולה: שם וערך, לפי הסדר שבו יישלחו */
export type SoapArgument = readonly [name: string, value: string | number];

export interface SoapClientOptions {
  timeoutMs?: number;
}

export interface UpnpFault {
  upnpErrorCode?: number;
  upnpErrorDescription?: string;
}

export type SeekUnit = 'REL_TIME' | 'ABS_TIME' | 'TRACK_NR';

export type UpnpItemClass = 'object.item.videoItem' | 'object.item.audioItem' | 'object.item';

export interface DidlLiteObject {
  id: string;
  parentId: string;
  restricted: boolean;
  title: string;
  class: UpnpItemClass;
}

export interface Resource {
  uri: string;
  protocolInfo: string;
  size?: number;
  duration?: string;
}

export interface PositionInfo {
  relTime: string;
  duration: string;
}

// ==========================================================================================
// Media analysis (ממומש מחוץ לליבה)
// ==========================================================================================

export interface FormatSummary {
  container: string;
  codec: string;
  bitrateKbps: number;
}

export interface EmbeddedSubtitleTrack {
  index: number;
  codec: string;
  language?: string;
  title?: string;
}

export interface SubtitleInventory {
  embeddedTracks: EmbeddedSubtitleTrack[];
  externalFiles: string[];
}

export interface MediaProbe {
  probeFormat(path: string): Promise<FormatSummary>;
  probeSubtitles(path: string): Promise<SubtitleInventory>;
}

export type OptimizeStrategy = 'remux' | 'transcode';

export interface ExternalCommand {
  command: string;
  args: string[];
  outputPath: string;
}

/**
 * @hebrew בונה פקודה חיצונית להמרת קובץ לפורמט ידידותי לטלוויזיה, או undefined כשאין צורך.
 */
export type OptimizeCommandBuilder = (
  path: string,
  targetBitrateMbps: number,
  strategy: OptimizeStrategy
) => ExternalCommand | undefined;

/** כתובית חיצונית (קובץ) או מסלול מוטמע (אינדקס). אחד מהשניים בלבד. */
export type SubtitleReference =
  | { kind: 'external'; path: string }
  | { kind: 'embedded'; trackIndex: number };
