import { createModuleLogger, discover, fetchDescription, findRendererCandidates } from '@media-cast/dlna-core';
import type { RendererCandidate, RendererSearchDependencies, RendererSearchOptions } from '@media-cast/dlna-core';

import { config } from './config';
import { detectOutboundAddress, FALLBACK_ADDRESS } from './localAddress';

const logger = createModuleLogger('rendererSearch');

export interface RendererSearchHooks extends Partial<RendererSearchDependencies> {
  resolveLocalAddress?: (probeHost: string, probePort: number) => Promise<string>;
}

async function outboundInterface(hooks: RendererSearchHooks): Promise<string | undefined> {
  const address = await (hooks.resolveLocalAddress ?? detectOutboundAddress)(
    config.session.outboundProbeHost,
    config.session.outboundProbePort
  );
  // loopback אינו ממשק מולטיקאסט שימושי; מערכת ההפעלה תבחר
  return address === FALLBACK_ADDRESS ? undefined : address;
}

/**
 * @hebrew מחפש מקרנים עם ברירות המחדל מ-`config` (מקטעי discovery ו-description).
 * המולטיקאסט יוצא מהממשק שמוביל אל מחוץ למחשב, אלא אם נקבע אחרת.
 */
export async function searchRenderers(
  options: RendererSearchOptions = {},
  hooks: RendererSearchHooks = {}
): Promise<RendererCandidate[]> {
  const multicastInterface = options.multicastInterface
    || config.discovery.multicastInterface
    || await outboundInterface(hooks);
  logger.debug(`Searching for renderers via ${multicastInterface ?? 'the default interface'}`);

  return findRendererCandidates(
    {
      timeoutMs: config.discovery.timeoutMs,
      mx: config.discovery.mx,
      searchTargets: config.discovery.searchTargets,
      descriptionTimeoutMs: config.description.timeoutMs,
      ...options,
      multicastInterface,
    },
    {
      discover: hooks.discover ?? discover,
      fetchDescription: hooks.fetchDescription ?? fetchDescription,
    }
  );
}
