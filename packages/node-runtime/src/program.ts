// packages/node-runtime/src/program.ts
import { Command, Option } from 'commander';
import { createReadStream, createWriteStream, existsSync, promises as fsp } from 'node:fs';
import type { Readable, Writable } from 'node:stream';
import {
  ConfigError,
  HEADER_SIZE,
  MAX_MESSAGE_LENGTH,
  toVerbosity,
  type MessageCodec,
  type StreamPipeWriter,
} from '../../core/src/index.js';
import { createCodec, createReader, createWriter } from './index.js';

export const PKG_VERSION = '1.0.0'; // sync with root package.json

const NEWLINE = new Uint8Array([0x0a]);

export interface CliIO {
  stdin  : Readable;
  stdout : Writable;
  stderr : Writable;
}

type GlobalOptions = {
  maxMessageSize? : number;
  verbose         : number;
};

type OutputOptions = {
  out   : string;
  lines : boolean;
};

type DecodeOptions = OutputOptions & {
  single : boolean;
};

interface Output {
  writer : StreamPipeWriter;
  finish(): Promise<void>;
  discard(): Promise<void>;
}

/** `Error [ClassName]: message` – the CLI's single error line format */
export function formatError(err: unknown): string {
  if (err instanceof Error) return `Error [${err.constructor.name}]: ${err.message}`;
  return `Error [Unknown]: ${String(err)}`;
}

function parseSize(v: string): number {
  const n = Number(v);
  if (!Number.isInteger(n) || n < 0 || n > MAX_MESSAGE_LENGTH) {
    throw new ConfigError(`Message size must be an integer between 0 and ${MAX_MESSAGE_LENGTH}`);
  }
  return n;
}

/** Split on LF, dropping a CR before it; a final terminator yields no empty line */
export function splitLines(bytes: Uint8Array): Uint8Array[] {
  const out: Uint8Array[] = [];
  let start = 0;
  for (let i = 0; i < bytes.length; i++) {
    if (bytes[i] !== 0x0a) continue;
    const end = i > start && bytes[i - 1] === 0x0d ? i - 1 : i;
    out.push(bytes.subarray(start, end));
    start = i + 1;
  }
  if (start < bytes.length) out.push(bytes.subarray(start));
  return out;
}

async function readAllBytes(r: Readable): Promise<Uint8Array> {
  const chunks: Buffer[] = [];
  for await (const chunk of r) {
    const c: unknown = chunk;
    if (c instanceof Uint8Array)    chunks.push(Buffer.from(c));
    else if (typeof c === 'string') chunks.push(Buffer.from(c, 'utf8'));
    else throw new TypeError('Input stream yielded a non-binary chunk');
  }
  return new Uint8Array(Buffer.concat(chunks));
}

export function createProgram(io: CliIO): Command {
  const program = new Command();

  const openInput = (src?: string): Readable => {
    if (!src || src === '-') return io.stdin;
    if (!existsSync(src)) throw new ConfigError(`Input file not found: ${src}`);
    return createReadStream(src);
  };

  /**
   * Writer plus the ways to end it: files are closed on success and removed
   * on failure, STDOUT is only flushed.
   */
  const openOutput = (out: string): Output => {
    if (out === '-') {
      const writer = createWriter(io.stdout);
      return { writer, finish: () => writer.flush(), discard: async () => undefined };
    }
    const file   = createWriteStream(out, { flags: 'w' });
    const writer = createWriter(file);
    return {
      writer,
      finish  : () => writer.complete(),
      discard : async () => {
        if (!file.closed) {
          await new Promise<void>(resolve => file.once('close', () => resolve()).destroy());
        }
        await fsp.rm(out, { force: true });
      },
    };
  };

  /** Run `body`; drop partial output if it fails */
  const withOutput = async (out: string, body: (output: Output) => Promise<void>): Promise<void> => {
    const output = openOutput(out);
    try {
      await body(output);
      await output.finish();
    } catch (err) {
      await output.discard();
      throw err;
    }
  };

  const codecFor = (): MessageCodec => {
    const opts = program.opts<GlobalOptions>();
    // no -m: protocol cap only, in both directions
    const limit = opts.maxMessageSize ?? null;
    return createCodec({
      maxSendMessageSize    : limit,
      maxReceiveMessageSize : limit,
      verbose               : toVerbosity(opts.verbose),
      logger                : msg => { io.stderr.write(msg + '\n'); },
    });
  };

  program
    .name('grpc-wire')
    .version(PKG_VERSION)
    .description('Frame and unframe length-prefixed gRPC messages')
    .exitOverride()
    .configureOutput({
      writeOut : str => { io.stdout.write(str); },
      writeErr : str => { io.stderr.write(str); },
    })

    .addOption(
      new Option('-m, --max-message-size <bytes>', `largest payload written or read (default: ${MAX_MESSAGE_LENGTH})`)
        .env('GRPC_WIRE_MAX_MESSAGE_SIZE')
        .argParser(parseSize)
    )

    // verbosity (repeatable)
    .addOption(
      new Option('-v, --verbose', 'increase verbosity (use multiple times)')
        .default(0)
        .argParser((_: string, previous: number) => previous + 1)
    );

  program
    .command('encode [src]')
    .description('Frame input as gRPC messages; omit arg or use - for STDIN')
    .option('-o, --out <file>', 'output file (default STDOUT)', '-')
    .option('-l, --lines', 'one message per input line', false)
    .action(async (src: string | undefined, opts: OutputOptions) => {
      const codec = codecFor();
      const input = await readAllBytes(openInput(src));

      const messages = opts.lines ? splitLines(input) : [input];
      await withOutput(opts.out, async ({ writer }) => {
        for (const message of messages) {
          await codec.writeMessage(writer, message);
        }
      });
    });

  program
    .command('decode [src]')
    .description('Write the payloads of framed input; omit arg or use - for STDIN')
    .option('-o, --out <file>', 'output file (default STDOUT)', '-')
    .option('-l, --lines', 'terminate every payload with a newline', false)
    .option('-s, --single', 'expect exactly one message', false)
    .action(async (src: string | undefined, opts: DecodeOptions) => {
      const codec  = codecFor();
      const reader = createReader(openInput(src));

      await withOutput(opts.out, async ({ writer }) => {
        const emit = async (payload: Uint8Array) => {
          writer.write(payload);
          if (opts.lines) writer.write(NEWLINE);
          await writer.flush();
        };

        if (opts.single) {
          const message = await codec.readMessage(reader, false);
          if (message !== null) await emit(message);
        } else {
          for await (const message of codec.readAll(reader)) await emit(message);
        }
      });
    });

  program
    .command('inspect [src]')
    .description('List the frames of framed input as JSON')
    .action(async (src: string | undefined) => {
      const codec  = codecFor();
      const reader = createReader(openInput(src));

      const frames: Array<{ index: number; offset: number; length: number }> = [];
      let offset = 0;
      for await (const message of codec.readAll(reader)) {
        frames.push({ index: frames.length, offset, length: message.byteLength });
        offset += HEADER_SIZE + message.byteLength;
      }
      io.stdout.write(JSON.stringify(frames, null, 2) + '\n');
    });

  return program;
}
