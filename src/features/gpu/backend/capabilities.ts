/**
 * Backend Capability Detection
 *
 * Detects which graphics backends can run in the current environment.
 */

import { createLogger } from '@/lib/logger';
import type { BackendName } from './types';

const logger = createLogger('Capabilities');

export async function detectWebGPUSupport(): Promise<boolean> {
  if (typeof navigator === 'undefined' || !navigator.gpu) {
    return false;
  }

  try {
    const adapter = await navigator.gpu.requestAdapter();
    return adapter !== null;
  } catch (error) {
    logger.debug('Adapter request failed', error);
    return false;
  }
}

export async function detectBestBackend(): Promise<BackendName> {
  return (await detectWebGPUSupport()) ? 'webgpu' : 'headless';
}

/** Usable backends, best first. The headless backend is always available. */
export async function getAvailableBackends(): Promise<BackendName[]> {
  const available: BackendName[] = [];

  if (await detectWebGPUSupport()) {
    available.push('webgpu');
  }

  available.push('headless');
  return available;
}
