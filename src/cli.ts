#!/usr/bin/env node
/**
 * scene-deps - CLI Interface
 *
 * Command-line interface for listing the external files scene files depend on.
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { readFileSync } from 'node:fs';
import { resolveDependencies, detectSceneKind } from './dependency-resolver.js';
import { SceneBinaryDecoder, collectDependencyPaths } from './scene-binary.js';
import { BufferLineSource, SceneTextParser, readStatements } from './scene-text.js';
import { isUdimPath } from './utils/path-utils.js';
import { logger } from './utils/logger.js';

const program = new Command();

// Version is set at build time
const version = '0.1.0';

interface ResolveCommandOptions {
  readonly recursive?: boolean;
  readonly json?: boolean;
  readonly expandEnv?: boolean;
  readonly verbose?: boolean;
}

function describePath(path: string): string {
  return isUdimPath(path) ? `${path} (UDIM tiles)` : path;
}

program
  .name('scene-deps')
  .description('List the references and texture files scene files depend on')
  .version(version);

program
  .command('resolve')
  .description('Resolve the dependencies of one or more scene files')
  .argument('<files...>', 'Scene files (.ma or .mb) to parse')
  .option('-r, --recursive', 'Also resolve scene files found among the dependencies')
  .option('--json', 'Print the result as JSON')
  .option('--expand-env', 'Expand environment variables in paths')
  .option('-v, --verbose', 'Log progress to stderr')
  .action((files: string[], options: ResolveCommandOptions) => {
    if (options.verbose) {
      logger.setLevel('debug');
    }

    const result = resolveDependencies(files.map(file => resolve(file)), {
      recursive: options.recursive ?? false,
      expandEnvironment: options.expandEnv ?? false,
    });

    if (options.json) {
      console.log(JSON.stringify({
        dependencies: Object.fromEntries(result.dependencies),
        errors: Object.fromEntries(result.errors),
      }, null, 2));
    } else {
      for (const [scenePath, dependencies] of result.dependencies) {
        console.log(`${scenePath} (${dependencies.length})`);
        for (const dependency of dependencies) {
          console.log(`  ${describePath(dependency)}`);
        }
      }
      for (const [scenePath, message] of result.errors) {
        console.error(`❌ ${scenePath}: ${message}`);
      }
    }

    if (result.errors.size > 0) {
      process.exitCode = 1;
    }
  });

program
  .command('inspect')
  .description('Print what the decoder sees in a single scene file')
  .argument('<file>', 'Scene file to inspect')
  .action((file: string) => {
    try {
      const filePath = resolve(file);
      if (detectSceneKind(filePath) === 'binary') {
        const document = SceneBinaryDecoder.read({ filePath });
        console.log(`Version: ${document.version ?? 'unknown'}`);
        if (document.units) {
          console.log(`Units: angle=${document.units.angle} linear=${document.units.linear} time=${document.units.time}`);
        }
        for (const plugin of document.plugins) {
          console.log(`Requires: ${plugin.name} ${plugin.version}`);
        }
        console.log(`Nodes: ${document.nodes.length}`);
        console.log(`Connections: ${document.connections.length}`);
        console.log(`Attributes: ${document.attributes.length}`);
        console.log('Dependencies:');
        for (const dependency of collectDependencyPaths(document)) {
          console.log(`  ${describePath(dependency)}`);
        }
      } else {
        const content = readFileSync(filePath);
        let statements = 0;
        for (const _statement of readStatements(new BufferLineSource(content))) {
          statements += 1;
        }
        console.log(`Statements: ${statements}`);
        console.log('Dependencies:');
        for (const dependency of SceneTextParser.parseBuffer({ content })) {
          console.log(`  ${describePath(dependency)}`);
        }
      }
    } catch (error) {
      logger.error('❌ Inspect failed:', error);
      process.exit(1);
    }
  });

program.parse();
