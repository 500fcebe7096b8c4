// Version is fixed at build time; keep in sync with package.json
export const PACKAGE_INFO = {
  name: 'wasmwright',
  version: '0.1.0',
} as const;
