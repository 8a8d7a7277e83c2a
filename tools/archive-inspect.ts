#!/usr/bin/env node

/**
 * CLI tool for inspecting and converting graph archives
 * 检查和转换图存档的CLI工具
 *
 * Decodes archive envelopes written by `saveGraph`, prints their version and
 * token stream, and re-encodes them between the JSON and binary formats.
 * 解码 `saveGraph` 写入的存档信封，打印其版本和令牌流，并在JSON与二进制格式之间转换。
 */

import * as fs from 'fs';
import * as path from 'path';
import { program } from 'commander';
import chalk from 'chalk';
import glob from 'glob';
import { describeToken } from '../src/archive/ArchiveError';
import { decodeEnvelope, encodeEnvelope, formatVersion } from '../src/archive/Codec';
import { ArchiveFormat } from '../src/archive/Types';
import type { ArchiveEnvelope } from '../src/archive/Types';

/**
 * Inspect command configuration
 * 检查命令配置
 */
interface InspectConfig {
  input: string[];
  /** Number of tokens to preview per file 每个文件预览的令牌数量 */
  limit: number;
  strict: boolean;
}

/**
 * Convert command configuration
 * 转换命令配置
 */
interface ConvertConfig {
  input: string;
  output: string;
  to: ArchiveFormat;
  prettyPrint: boolean;
  strict: boolean;
}

interface InspectionResult {
  filePath: string;
  success: boolean;
  error?: string;
  summary?: {
    format: ArchiveFormat;
    version: string;
    timestamp: number;
    tokenCount: number;
  };
}

interface ConversionResult {
  filePath: string;
  outputPath: string;
  success: boolean;
  error?: string;
  size?: number;
}

/**
 * Pick the decoder from the file extension: `.json` is text, the rest binary
 * 根据扩展名选择解码方式
 */
function detectFormat(filePath: string): ArchiveFormat {
  return path.extname(filePath).toLowerCase() === '.json' ? ArchiveFormat.JSON : ArchiveFormat.Binary;
}

function parseFormat(value: string): ArchiveFormat | undefined {
  return Object.values(ArchiveFormat).find(format => format === value.toLowerCase());
}

/**
 * Main CLI class
 * 主要CLI类
 */
class ArchiveInspectorCLI {
  private async readEnvelope(filePath: string, strict: boolean): Promise<ArchiveEnvelope> {
    if (detectFormat(filePath) === ArchiveFormat.JSON) {
      const text = await fs.promises.readFile(filePath, 'utf-8');
      return decodeEnvelope(text, { strict });
    }
    const buffer = await fs.promises.readFile(filePath);
    return decodeEnvelope(new Uint8Array(buffer), { strict });
  }

  /**
   * Inspect a single archive file
   * 检查单个存档文件
   */
  async inspectFile(filePath: string, config: InspectConfig): Promise<InspectionResult> {
    const relativePath = path.relative(process.cwd(), filePath);

    try {
      console.log(chalk.blue(`📖 Reading archive: ${relativePath}`));

      const format = detectFormat(filePath);
      const envelope = await this.readEnvelope(filePath, config.strict);
      const version = formatVersion(envelope.version);
      const tokenCount = envelope.tokens.length;

      console.log(chalk.gray(`   ├── format ${format}, version ${version}, written ${new Date(envelope.timestamp).toISOString()}`));
      console.log(chalk.gray(`   ├── ${tokenCount} token(s)`));

      envelope.tokens.slice(0, config.limit).forEach((token, index) => {
        console.log(chalk.gray(`   │   ${index}: ${describeToken(token)}`));
      });
      if (tokenCount > config.limit) {
        console.log(chalk.gray(`   └── ... ${tokenCount - config.limit} more`));
      }

      return {
        filePath,
        success: true,
        summary: { format, version, timestamp: envelope.timestamp, tokenCount }
      };

    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      console.log(chalk.red(`❌ Failed to read: ${relativePath}`));
      console.log(chalk.red(`   └── ${errorMessage}`));

      return { filePath, success: false, error: errorMessage };
    }
  }

  /**
   * Expand glob patterns into file paths
   * 将glob模式扩展为文件路径
   */
  expandInputs(patterns: string[]): string[] {
    const inputFiles = new Set<string>();
    for (const pattern of patterns) {
      if (glob.hasMagic(pattern)) {
        glob.sync(pattern, { absolute: true }).forEach(file => inputFiles.add(file));
      } else {
        inputFiles.add(path.resolve(pattern));
      }
    }
    return Array.from(inputFiles);
  }

  /**
   * Inspect multiple files
   * 检查多个文件
   */
  async inspectFiles(config: InspectConfig): Promise<InspectionResult[]> {
    const results: InspectionResult[] = [];
    const files = this.expandInputs(config.input);

    if (files.length === 0) {
      console.log(chalk.yellow('⚠️  No input files found'));
      return results;
    }

    for (const file of files) {
      results.push(await this.inspectFile(file, config));
    }

    const successful = results.filter(r => r.success).length;
    const failed = results.length - successful;

    console.log('');
    console.log(chalk.blue('📊 Inspection Summary:'));
    console.log(chalk.green(`   ✅ Readable: ${successful}`));
    if (failed > 0) {
      console.log(chalk.red(`   ❌ Failed: ${failed}`));
    }

    return results;
  }

  /**
   * Re-encode an archive in another format, keeping its token stream and timestamp
   * 以另一种格式重新编码存档，保留令牌流和时间戳
   */
  async convertFile(config: ConvertConfig): Promise<ConversionResult> {
    const { input, output } = config;

    try {
      console.log(chalk.blue(`📖 Reading archive: ${path.relative(process.cwd(), input)}`));
      const envelope = await this.readEnvelope(input, config.strict);

      const { data, size } = encodeEnvelope(
        envelope.tokens,
        { format: config.to, prettyPrint: config.prettyPrint },
        envelope.timestamp
      );

      await fs.promises.mkdir(path.dirname(output), { recursive: true });
      await fs.promises.writeFile(output, data);

      console.log(chalk.green(`✅ Converted to ${config.to}: ${path.relative(process.cwd(), output)}`));
      console.log(chalk.gray(`   └── ${envelope.tokens.length} token(s), ${size} bytes`));

      return { filePath: input, outputPath: output, success: true, size };

    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      console.log(chalk.red(`❌ Failed to convert: ${path.relative(process.cwd(), input)}`));
      console.log(chalk.red(`   └── ${errorMessage}`));

      return { filePath: input, outputPath: output, success: false, error: errorMessage };
    }
  }
}

/**
 * Main program entry point
 * 主程序入口点
 */
async function main(): Promise<void> {
  program
    .name('graph-archive')
    .description('Inspect and convert object graph archives')
    .version('0.1.0');

  program
    .command('inspect')
    .argument('<input...>', 'Archive files (supports glob patterns)')
    .option('-l, --limit <count>', 'Number of tokens to preview', '20')
    .option('--strict', 'Fail on incompatible archive versions')
    .action(async (input: string[], options: { limit: string; strict?: boolean }) => {
      const limit = parseInt(options.limit, 10);
      const cli = new ArchiveInspectorCLI();
      const results = await cli.inspectFiles({
        input,
        limit: Number.isNaN(limit) ? 20 : limit,
        strict: options.strict === true
      });
      process.exit(results.some(r => !r.success) ? 1 : 0);
    });

  program
    .command('convert')
    .argument('<input>', 'Archive file to convert')
    .requiredOption('-o, --output <path>', 'Output file')
    .option('--to <format>', 'Target format (json/binary)', 'binary')
    .option('--pretty', 'Pretty print JSON output')
    .option('--strict', 'Fail on incompatible archive versions')
    .action(async (input: string, options: { output: string; to: string; pretty?: boolean; strict?: boolean }) => {
      const to = parseFormat(options.to);
      if (to === undefined) {
        console.error(chalk.red(`❌ Unknown format: ${options.to}`));
        process.exit(1);
        return;
      }

      const cli = new ArchiveInspectorCLI();
      const result = await cli.convertFile({
        input,
        output: options.output,
        to,
        prettyPrint: options.pretty === true,
        strict: options.strict === true
      });
      process.exit(result.success ? 0 : 1);
    });

  program.addHelpText('after', `
Examples:
  graph-archive inspect scene.bin                       # Inspect one archive
  graph-archive inspect "saves/*.bin" --limit 5         # Inspect many archives
  graph-archive convert scene.bin -o scene.json --to json --pretty
`);

  await program.parseAsync();
}

// Run the CLI tool 运行CLI工具
if (require.main === module) {
  main().catch(error => {
    console.error(chalk.red('❌ Unhandled error:'), error);
    process.exit(1);
  });
}

export { ArchiveInspectorCLI, detectFormat };
export type { InspectConfig, ConvertConfig, InspectionResult, ConversionResult };
