/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { dirname, resolve } from 'node:path';
import { Command } from 'commander';
import { createClient, type ClientConfig, type MeshcatClient } from '@meshlink/client';
import { loadMesh, sceneObject } from '@meshlink/scene';
import { loadUrdfFile, publishUrdf } from '@meshlink/urdf';
import { runDemo } from './demo.js';
import { parseColor, parseInteger, parsePropertyArgs } from './parse.js';

export const VERSION = '0.1.0';

type GlobalOptions = {
  endpoint?: string;
  timeout?: number;
  retries?: number;
};

export interface ProgramDeps {
  connect?: (config: ClientConfig) => MeshcatClient;
  print?: (line: string) => void;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Build the `meshlink` command tree. Every subcommand opens a client from
 * the global options and closes it when done.
 */
export function createProgram(deps: ProgramDeps = {}): Command {
  const connect = deps.connect ?? ((config: ClientConfig) => createClient(config));
  const print = deps.print ?? ((line: string) => console.log(line));

  const withClient = async (command: Command, run: (client: MeshcatClient) => Promise<void>) => {
    const { endpoint, timeout, retries } = command.optsWithGlobals<GlobalOptions>();
    const client = connect({ endpoint, timeout, retries });
    try {
      await run(client);
    } finally {
      await client.close();
    }
  };

  const program = new Command();

  program
    .name('meshlink')
    .description('Send scene commands to a running meshcat-server')
    .version(VERSION)
    .option('-e, --endpoint <url>', 'server endpoint (default: $MESHLINK_ENDPOINT or tcp://127.0.0.1:6000)')
    .option('-t, --timeout <ms>', 'reply timeout in milliseconds', parseInteger)
    .option('-r, --retries <n>', 'attempts after a lost reply', parseInteger);

  program
    .command('url')
    .description('Print the viewer URL')
    .action(async (_options: object, command: Command) => {
      await withClient(command, async (client) => {
        print(await client.url());
      });
    });

  program
    .command('delete <path>')
    .description('Delete a path and everything below it')
    .action(async (path: string, _options: object, command: Command) => {
      await withClient(command, async (client) => {
        await client.delete(path);
      });
    });

  program
    .command('property <path> <name> <values...>')
    .description('Set a property, e.g. `property /Axes visible false`')
    .action(async (path: string, name: string, values: string[], _options: object, command: Command) => {
      const { property, value } = parsePropertyArgs(path, name, values);
      await withClient(command, async (client) => {
        await client.setProperty(path, property, value);
      });
    });

  program
    .command('mesh <file> <path>')
    .description('Publish an .obj, .dae or .stl mesh')
    .option('-c, --color <hex>', 'material color, e.g. #ff8800', parseColor)
    .action(async (file: string, path: string, options: { color?: number }, command: Command) => {
      const builder = sceneObject().geometry(loadMesh(file));
      if (options.color !== undefined) {
        builder.material({ color: options.color });
      }
      await withClient(command, async (client) => {
        await client.setObject(path, builder);
      });
    });

  program
    .command('urdf <file>')
    .description('Publish a URDF robot description')
    .option('-p, --prefix <path>', 'path to publish the robot under', '/')
    .option('--collision', 'publish collision geometry instead of visuals', false)
    .option('--package-root <dir>', 'directory that package:// URIs resolve against')
    .action(
      async (
        file: string,
        options: { prefix: string; collision: boolean; packageRoot?: string },
        command: Command
      ) => {
        const robot = loadUrdfFile(file);
        await withClient(command, async (client) => {
          const result = await publishUrdf(client, robot, {
            prefix: options.prefix,
            useCollision: options.collision,
            packageRoot: options.packageRoot,
            baseDir: dirname(resolve(file)),
          });
          print(`Published ${robot.name}: ${result.published.length} links, ${robot.joints.length} joints`);
        });
      }
    );

  program
    .command('demo')
    .description('Publish the demo scene and animate it')
    .option('-n, --frames <n>', 'animation frames', parseInteger, 100)
    .option('-i, --interval <ms>', 'milliseconds between frames', parseInteger, 100)
    .action(async (options: { frames: number; interval: number }, command: Command) => {
      await withClient(command, async (client) => {
        await runDemo(client, { frames: options.frames, interval: options.interval, sleep: deps.sleep });
      });
    });

  return program;
}
