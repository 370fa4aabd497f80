#!/usr/bin/env npx tsx
/**
 * CLI tool to decode one CAN frame against a DBC file.
 *
 * Usage:
 *   npx tsx cli/decode-frame.ts <file.dbc> <frame-id> <hex-payload> [--node NAME]
 *
 * The frame id may be decimal or 0x-prefixed hex. With --node, only the
 * signals that node receives are printed.
 */

import * as fs from 'fs';
import * as path from 'path';
import { loadDbc } from '../src/parser/toDatabase';
import { NodeScopedCodec } from '../src/codecs/NodeScopedCodec';
import { hexToBytes } from '../src/BitBuffer';
import { formatFrameId } from '../src/frameId/ArbitrationId';
import type { ArbitrationId } from '../src/frameId/ArbitrationId';
import type { DecodedMessage } from '../src/codecs/DecodedSignal';

function formatArbitrationId(id: ArbitrationId): string {
  switch (id.kind) {
    case 'Standard':
    case 'Extended':
      return id.kind;
    case 'J1939':
      return `J1939 priority=${id.priority} pgn=0x${id.pgn.toString(16).toUpperCase()} ` +
        `sa=0x${id.sourceAddress.toString(16).toUpperCase()}`;
    case 'GMParameterId':
      return `GM priority=${id.priority} parameterId=0x${id.parameterId.toString(16).toUpperCase()} ` +
        `sourceId=0x${id.sourceId.toString(16).toUpperCase()}`;
    case 'GMParameterIdStandard':
      return `GM requestType=${id.requestType} arbitrationId=0x${id.arbitrationId.toString(16).toUpperCase()}`;
  }
}

function printDecoded(decoded: DecodedMessage): void {
  const names = Object.keys(decoded.signals);
  if (names.length === 0) {
    console.log('  (no signals)');
    return;
  }
  const width = Math.max(...names.map(n => n.length));
  for (const signal of Object.values(decoded.signals)) {
    const unit = signal.unit ? ` ${signal.unit}` : '';
    const label = signal.label !== undefined ? ` (${signal.label})` : '';
    console.log(`  ${signal.name.padEnd(width)} = ${signal.value}${unit}${label}`);
  }
}

function main(): void {
  const args = process.argv.slice(2);
  const nodeFlag = args.indexOf('--node');
  const nodeName = nodeFlag >= 0 ? args[nodeFlag + 1] : undefined;
  const positional = nodeFlag >= 0 ? args.filter((_, i) => i !== nodeFlag && i !== nodeFlag + 1) : args;

  if (positional.length < 3 || (nodeFlag >= 0 && !nodeName)) {
    console.error('Usage: npx tsx cli/decode-frame.ts <file.dbc> <frame-id> <hex-payload> [--node NAME]');
    process.exit(1);
  }

  const dbcPath = path.resolve(positional[0]);
  if (!fs.existsSync(dbcPath)) {
    console.error(`Error: file not found: ${dbcPath}`);
    process.exit(1);
  }

  const frameId = Number(positional[1]);
  if (!Number.isInteger(frameId)) {
    console.error(`Error: invalid frame id "${positional[1]}"`);
    process.exit(1);
  }

  try {
    const database = loadDbc(fs.readFileSync(dbcPath, 'utf-8'));
    const data = hexToBytes(positional[2]);
    const message = database.getMessage(frameId);

    console.log(`${message.name} ${formatFrameId(message.frameId, message.isExtended)} [${data.length} bytes]`);
    console.log(`id: ${formatArbitrationId(database.arbitrationId(message))}`);

    if (nodeName) {
      const codec = new NodeScopedCodec(database);
      console.log(`received by ${nodeName}:`);
      printDecoded(codec.decodeForNodeWithMetadata(nodeName, message, data));
    } else {
      const decoded = database.codec(message).decodeBytesWithMetadata(data);
      if (decoded.multiplexorValue !== undefined) {
        console.log(`multiplexor: ${decoded.multiplexorValue}`);
      }
      printDecoded(decoded);
    }
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

main();
