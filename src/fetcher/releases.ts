/**
 * Where each downloadable tool's release lives and what its archive contains.
 */

import { DEFAULT_WASM_OPT_VERSION } from '../types.js';
import { isMacPlatform, isWindowsPlatform } from '../utils/platform.js';

export type ArchiveFormat = 'tar.gz' | 'none';

export interface ToolRelease {
  name: string;
  defaultVersion: string;
  archive: ArchiveFormat;
  /** Platform triples with a published asset */
  platforms: readonly string[];
  url(version: string, platform: string): string;
  /** Executable path relative to the cache entry */
  binaryPath(version: string, platform: string): string;
  /** Other files relative to the cache entry that must be present and executable */
  companions(version: string, platform: string): string[];
  /** Known sha256 digests, keyed by `<version>/<platform>` */
  sha256?: Readonly<Record<string, string>>;
}

export const WASM_OPT_RELEASE: ToolRelease = {
  name: 'wasm-opt',
  defaultVersion: DEFAULT_WASM_OPT_VERSION,
  archive: 'tar.gz',
  platforms: ['x86_64-linux', 'x86_64-macos', 'arm64-macos', 'x86_64-windows'],
  url: (version, platform) =>
    `https://github.com/WebAssembly/binaryen/releases/download/version_${version}/binaryen-version_${version}-${platform}.tar.gz`,
  binaryPath: (version, platform) =>
    `binaryen-version_${version}/bin/wasm-opt${isWindowsPlatform(platform) ? '.exe' : ''}`,
  companions: (version, platform) =>
    isMacPlatform(platform) ? [`binaryen-version_${version}/lib/libbinaryen.dylib`] : [],
};

export const DEFAULT_RELEASES: Readonly<Record<string, ToolRelease>> = {
  [WASM_OPT_RELEASE.name]: WASM_OPT_RELEASE,
};

export function releaseKey(version: string, platform: string): string {
  return `${version}/${platform}`;
}
