export const CONFIG_FILE_NAMES = [
  '.mutswitchrc.json',
  '.mutswitchrc.yml',
  '.mutswitchrc.yaml',
];

export const DEFAULTS = {
  include: ['src/**/*.{ts,tsx,js,jsx,mts,cts,mjs,cjs}'],
  timeout: 300,
  output: 'text' as const,
  moduleFormat: 'esm' as const,
  runtimeModule: 'mutswitch/runtime',
  registryFile: '.mutswitch/mutations.json',
  failOnSurvived: false,
  dryRun: false,
};
