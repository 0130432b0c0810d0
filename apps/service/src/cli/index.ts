import { readFile } from 'node:fs/promises';

import { Command, Option } from 'commander';
import { z } from 'zod';

import type { SiteComparisonService } from '../sites/service.js';

const OutputFormatSchema = z.enum(['json', 'markdown']);

type OutputFormat = z.infer<typeof OutputFormatSchema>;

const formatOption = () =>
  new Option('--format <format>', 'Output format').choices(OutputFormatSchema.options).default('json');

const readReport = async (path: string | undefined): Promise<string | undefined> =>
  path === undefined ? undefined : readFile(path, 'utf-8');

export interface CreateCliOptions {
  readonly service: SiteComparisonService;
  readonly stdout?: NodeJS.WritableStream;
  readonly stderr?: NodeJS.WritableStream;
}

export const createCli = (options: CreateCliOptions): Command => {
  const program = new Command();
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  const service = options.service;

  const writeJson = (value: unknown) => {
    const serialized = JSON.stringify(value, null, 2);
    stdout.write(`${serialized}\n`);
  };

  const writeOutput = (format: OutputFormat, json: unknown, markdown: string) => {
    if (format === 'markdown') {
      stdout.write(`${markdown}\n`);
      return;
    }
    writeJson(json);
  };

  const handle = <T extends unknown[]>(runner: (...args: T) => Promise<void>) => {
    return async (...args: T) => {
      try {
        await runner(...args);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        stderr.write(`${message}\n`);
        throw error;
      }
    };
  };

  program.name('siteline').description('Assess and compare candidate wind-farm sites');

  program
    .command('sites')
    .description('List the surveyed candidate sites')
    .action(
      handle(async () => {
        writeJson({ sites: service.listSites() });
      })
    );

  program
    .command('assess <name>')
    .description('Run every assessment stage for one site')
    .option('--report <path>', 'File holding the environmental report for the site')
    .addOption(formatOption())
    .action(
      handle(async (name: string, command: { report?: string; format: string }) => {
        const format = OutputFormatSchema.parse(command.format);
        const result = await service.assess({
          name,
          environmentalReport: await readReport(command.report)
        });
        writeOutput(format, result.assessment, result.report);
      })
    );

  program
    .command('compare <siteA> <siteB>')
    .description('Assess two sites one after the other and recommend one of them')
    .option('--report-a <path>', 'File holding the environmental report for the first site')
    .option('--report-b <path>', 'File holding the environmental report for the second site')
    .addOption(formatOption())
    .action(
      handle(
        async (
          siteA: string,
          siteB: string,
          command: { reportA?: string; reportB?: string; format: string }
        ) => {
          const format = OutputFormatSchema.parse(command.format);
          const result = await service.compare(
            { name: siteA, environmentalReport: await readReport(command.reportA) },
            { name: siteB, environmentalReport: await readReport(command.reportB) }
          );
          writeOutput(format, result.run, result.report);
        }
      )
    );

  return program;
};
