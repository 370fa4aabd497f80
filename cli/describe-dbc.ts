#!/usr/bin/env npx tsx
/**
 * CLI tool to print the nodes, messages and signals of a DBC file with their
 * resolved attributes.
 *
 * Usage:
 *   npx tsx cli/describe-dbc.ts <file.dbc>
 */

import * as fs from 'fs';
import * as path from 'path';
import { loadDbc } from '../src/parser/toDatabase';
import { formatFrameId } from '../src/frameId/ArbitrationId';
import type { AttributeScalar } from '../src/model/types';

function formatAttributes(attributes: Record<string, AttributeScalar>): string {
  const entries = Object.entries(attributes);
  if (entries.length === 0) return '';
  return ' {' + entries.map(([k, v]) => `${k}=${typeof v === 'string' ? JSON.stringify(v) : v}`).join(', ') + '}';
}

function main(): void {
  const args = process.argv.slice(2);

  if (args.length < 1) {
    console.error('Usage: npx tsx cli/describe-dbc.ts <file.dbc>');
    process.exit(1);
  }

  const dbcPath = path.resolve(args[0]);
  if (!fs.existsSync(dbcPath)) {
    console.error(`Error: file not found: ${dbcPath}`);
    process.exit(1);
  }

  try {
    const db = loadDbc(fs.readFileSync(dbcPath, 'utf-8'));
    const { resolver } = db;

    console.log(`=== ${path.basename(dbcPath)} ===`);
    if (db.version) console.log(`version: ${db.version}`);
    console.log(`attributes:${formatAttributes(resolver.resolveAll({ kind: 'Database' }))}`);

    console.log(`\n--- Nodes (${db.nodes.length}) ---`);
    for (const node of db.nodes) {
      const tx = db.transmittedMessages(node).map(m => m.name);
      console.log(`${node.name}${formatAttributes(resolver.resolveAll({ kind: 'Node', node }))}`);
      console.log(`  transmits: ${tx.length > 0 ? tx.join(', ') : '-'}`);
    }

    console.log(`\n--- Messages (${db.messages.length}) ---`);
    for (const message of db.messages) {
      const id = formatFrameId(message.frameId, message.isExtended);
      console.log(
        `${id} ${message.name} [${message.byteLength}] from ${message.transmitter ?? '-'} (${db.idScheme(message)})` +
        formatAttributes(resolver.resolveAll({ kind: 'Message', message })),
      );
      for (const signal of message.signals) {
        const role = signal.multiplexer.kind === 'None' ? '' : ` ${signal.multiplexer.kind}`;
        console.log(
          `  ${signal.name} ${signal.startBit}|${signal.bitLength}@${signal.byteOrder} ${signal.valueKind}` +
          ` (${signal.factor},${signal.offset}) "${signal.unit}"${role}` +
          formatAttributes(resolver.resolveAll({ kind: 'Signal', message, signal })),
        );
      }
    }
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

main();
