import path from 'node:path';
import config from 'config';
import { DEFAULT_FINGERPRINT_VALUES } from '../fingerprinting/engine.js';

export type EngineSettings = {
  rulesPath: string;
  watch: boolean;
  defaultFingerprint: string[];
};

function read<T>(key: string, fallback: T): T {
  return config.has(key) ? config.get<T>(key) : fallback;
}

export function getEngineSettings(): EngineSettings {
  const rulesPath = read('fingerprinting.rulesPath', 'config/fingerprinting.json');
  return {
    rulesPath: path.resolve(process.cwd(), rulesPath),
    watch: read('fingerprinting.watch', false),
    defaultFingerprint: [...read<readonly string[]>('fingerprinting.defaultFingerprint', DEFAULT_FINGERPRINT_VALUES)]
  };
}
