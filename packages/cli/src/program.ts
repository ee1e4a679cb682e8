/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * `umbra` command line program
 *
 * Renders a JSON scene description to a PPM image.
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import { setDebugEnabled } from '@umbra/diagnostics';
import { PpmExporter } from '@umbra/export';
import { parseSceneDescription, renderScene } from '@umbra/scene';

/** Side effects of the program, replaced in tests */
export interface CliDependencies {
  readFile: (path: string) => string;
  writeFile: (path: string, contents: string) => void;
  render: typeof renderScene;
  out: (line: string) => void;
  err: (line: string) => void;
  exit: (code: number) => void;
}

interface RenderCommandOptions {
  output?: string;
  width?: number;
  height?: number;
  workers?: number;
  maxReflections?: number;
  bandHeight?: number;
  verbose: boolean;
}

const DEFAULT_DEPENDENCIES: CliDependencies = {
  readFile: (path) => readFileSync(path, 'utf8'),
  writeFile: (path, contents) => writeFileSync(path, contents),
  render: renderScene,
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  exit: (code) => process.exit(code),
};

function parseCount(minimum: number): (value: string) => number {
  return (value) => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < minimum) {
      throw new InvalidArgumentError(`Expected an integer >= ${minimum}.`);
    }
    return parsed;
  };
}

/** Output path for a scene when none is given: scene.json -> scene.ppm */
export function defaultOutputPath(scenePath: string): string {
  return scenePath.replace(/\.json$/i, '') + '.ppm';
}

export function createProgram(overrides: Partial<CliDependencies> = {}): Command {
  const deps: CliDependencies = { ...DEFAULT_DEPENDENCIES, ...overrides };
  const program = new Command();

  program
    .name('umbra')
    .description('Render scenes with a recursive ray tracer')
    .version('0.1.0')
    .configureOutput({
      writeOut: (text) => deps.out(text.trimEnd()),
      writeErr: (text) => deps.err(text.trimEnd()),
    });

  program
    .command('render')
    .description('Render a JSON scene description to a PPM image')
    .argument('<scene>', 'Path to the scene description (.json)')
    .option('-o, --output <file>', 'Output image (default: the scene path with .ppm)')
    .option('--width <pixels>', 'Override the camera width', parseCount(1))
    .option('--height <pixels>', 'Override the camera height', parseCount(1))
    .option('-w, --workers <count>', 'Worker threads (default: available parallelism)', parseCount(1))
    .option('--max-reflections <count>', 'Reflection and refraction depth', parseCount(0))
    .option('--band-height <rows>', 'Rows per unit of work', parseCount(1))
    .option('-v, --verbose', 'Verbose output', false)
    .action(async (scenePath: string, options: RenderCommandOptions) => {
      try {
        if (options.verbose) {
          setDebugEnabled(true);
        }

        const started = Date.now();
        const json: unknown = JSON.parse(deps.readFile(scenePath));
        const description = parseSceneDescription(json);
        const camera = {
          ...description.camera,
          width: options.width ?? description.camera.width,
          height: options.height ?? description.camera.height,
        };

        const canvas = await deps.render(
          { ...description, camera },
          {
            workers: options.workers,
            maxReflections: options.maxReflections,
            bandHeight: options.bandHeight,
            baseDir: dirname(resolve(scenePath)),
          }
        );

        const output = options.output ?? defaultOutputPath(scenePath);
        deps.writeFile(output, canvas.toImage(new PpmExporter()));
        deps.out(`Rendered ${canvas.width}x${canvas.height} to ${output} in ${Date.now() - started}ms`);
      } catch (error) {
        deps.err(`Error: ${error instanceof Error ? error.message : String(error)}`);
        deps.exit(1);
      }
    });

  return program;
}
