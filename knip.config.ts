import type { KnipConfig } from 'knip';

const config: KnipConfig = {
    entry: [
        'src/index.ts',           // HTTP server entry
        'src/cli/index.ts',       // CLI bin entry
        'scripts/**/*.ts',        // Operational scripts
    ],
    project: [
        'src/**/*.ts',
        'scripts/**/*.ts',
    ],
    ignore: [
        'dist/**',
    ],
    ignoreExportsUsedInFile: true,
};

export default config;
