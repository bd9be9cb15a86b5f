import * as esbuild from 'esbuild';
import process from 'node:process';

const banner = `/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */`;

const baseConfig: esbuild.BuildOptions = {
	bundle: true,
	logLevel: 'info',
	banner: { js: banner },
	legalComments: 'none',
};

/** Creates CJS and ESM variants of the platform-neutral core, each unminified and minified. */
const createCoreVariants = async (outfileBase: string) => {
	const variants: esbuild.BuildOptions[] = [
		{ format: 'cjs', outfile: `${outfileBase}.cjs` },
		{ format: 'esm', outfile: `${outfileBase}.mjs` },
		{ format: 'cjs', outfile: `${outfileBase}.min.cjs`, minify: true },
		{ format: 'esm', outfile: `${outfileBase}.min.mjs`, minify: true },
	];

	return Promise.all(variants.map(variant => esbuild.context({
		...baseConfig,
		entryPoints: ['src/index.ts'],
		platform: 'neutral',
		...variant,
	})));
};

const coreVariants = await createCoreVariants('dist/bundles/metasplice');

const nodeVariant = await esbuild.context({
	...baseConfig,
	entryPoints: ['src/node.ts'],
	platform: 'node',
	format: 'esm',
	outfile: 'dist/bundles/metasplice-node.mjs',
});

const contexts = [
	...coreVariants,
	nodeVariant,
];

if (process.argv[2] === '--watch') {
	await Promise.all(contexts.map(ctx => ctx.watch()));
} else {
	for (const ctx of contexts) {
		await ctx.rebuild();
		await ctx.dispose();
	}
}
