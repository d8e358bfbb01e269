import { fileURLToPath } from 'node:url';
import { dirname, resolve } from 'node:path';
import { createRequire } from 'node:module';
import { defineConfig } from 'vitest/config';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const require = createRequire(import.meta.url);
const pkg = require('./package.json') as { dependencies?: Record<string, string> };
const deps = Object.keys(pkg.dependencies || {});

function isDependencyImport(id: string) {
	return deps.some((dep) => id === dep || id.startsWith(`${dep}/`));
}

export default defineConfig({
	build: {
		outDir: 'dist',
		target: 'es2022',
		emptyOutDir: true,
		lib: {
			entry: { 'cbor-minimal': resolve(__dirname, 'src/index.ts') },
			formats: ['es', 'cjs'],
			fileName: (format, entryName) => `${entryName}.${format === 'es' ? 'es.js' : 'cjs'}`,
		},
		rollupOptions: {
			// keep deps external so consumers dedupe them
			external: isDependencyImport,
		},
		sourcemap: true,
	},
	test: {
		name: 'node',
		globals: true,
		environment: 'node',
		include: ['test/**/*.test.ts'],
	},
});
