// Host platform triple used to key the tool cache and pick release assets

const OS_NAMES: Partial<Record<NodeJS.Platform, string>> = {
  linux: 'linux',
  darwin: 'macos',
  win32: 'windows',
};

function archName(arch: string, os: string): string {
  switch (arch) {
    case 'x64':
      return 'x86_64';
    case 'arm64':
      return os === 'macos' ? 'arm64' : 'aarch64';
    case 'ia32':
      return 'x86';
    default:
      return arch;
  }
}

/**
 * `<arch>-<os>`, e.g. `x86_64-linux` or `arm64-macos`.
 */
export function hostPlatform(
  platform: NodeJS.Platform = process.platform,
  arch: string = process.arch
): string {
  const os = OS_NAMES[platform] ?? platform;
  return `${archName(arch, os)}-${os}`;
}

export function isWindowsPlatform(platform: string): boolean {
  return platform.endsWith('-windows');
}

export function isMacPlatform(platform: string): boolean {
  return platform.endsWith('-macos');
}
