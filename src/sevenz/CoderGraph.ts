// Coder graph of a folder: coders are nodes addressed by index, bind pairs are
// edges from one coder's output stream to another coder's input stream.
// Stream indices are folder-wide: coder i owns the inputs starting at the sum
// of numInStreams of coders 0..i-1 (outputs likewise).

import { MalformedFolderError } from './errors.ts';
import type { Folder } from './headers.ts';

/** What feeds a folder input stream. */
export type InputSource = { type: 'pack'; slot: number } | { type: 'coder'; outIndex: number };

export interface CoderGraph {
  /** First folder-wide input index of each coder */
  inStreamStart: number[];
  /** First folder-wide output index of each coder */
  outStreamStart: number[];
  /** Source of each folder input, indexed by input index */
  inputSources: InputSource[];
  /** The one output no bind pair consumes */
  finalOutput: number;
  /** Coder indices in execution order */
  order: number[];
}

/**
 * Outputs of the folder not consumed by any bind pair.
 */
export function findUnboundOutputs(folder: Folder): number[] {
  let totalOut = 0;
  for (let i = 0; i < folder.coders.length; i++) totalOut += folder.coders[i].numOutStreams;

  const unbound: number[] = [];
  for (let out = 0; out < totalOut; out++) {
    if (!folder.bindPairs.some((pair) => pair.outIndex === out)) unbound.push(out);
  }
  return unbound;
}

/**
 * Validate the folder and compute its decode plan.
 * Execution order is Kahn's algorithm, ties broken by declaration order.
 */
export function buildCoderGraph(folder: Folder, folderIndex?: number): CoderGraph {
  const fail = (message: string): never => {
    throw new MalformedFolderError(message, folderIndex);
  };

  const inStreamStart: number[] = [];
  const outStreamStart: number[] = [];
  // owning coder of each folder-wide stream index
  const coderOfInput: number[] = [];
  const coderOfOutput: number[] = [];
  for (let i = 0; i < folder.coders.length; i++) {
    inStreamStart.push(coderOfInput.length);
    outStreamStart.push(coderOfOutput.length);
    for (let j = 0; j < folder.coders[i].numInStreams; j++) coderOfInput.push(i);
    for (let j = 0; j < folder.coders[i].numOutStreams; j++) coderOfOutput.push(i);
  }
  const totalIn = coderOfInput.length;
  const totalOut = coderOfOutput.length;

  const sources: (InputSource | undefined)[] = [];
  for (let i = 0; i < totalIn; i++) sources.push(undefined);
  const outputBound: boolean[] = [];
  for (let i = 0; i < totalOut; i++) outputBound.push(false);

  for (let i = 0; i < folder.bindPairs.length; i++) {
    const { inIndex, outIndex } = folder.bindPairs[i];
    if (inIndex >= totalIn) fail(`bind pair ${i} references input ${inIndex} of ${totalIn}`);
    if (outIndex >= totalOut) fail(`bind pair ${i} references output ${outIndex} of ${totalOut}`);
    if (sources[inIndex] !== undefined) fail(`input ${inIndex} is bound twice`);
    if (outputBound[outIndex]) fail(`output ${outIndex} is bound twice`);
    sources[inIndex] = { type: 'coder', outIndex: outIndex };
    outputBound[outIndex] = true;
  }

  for (let slot = 0; slot < folder.packedStreams.length; slot++) {
    const inIndex = folder.packedStreams[slot];
    if (inIndex >= totalIn) fail(`pack stream ${slot} references input ${inIndex} of ${totalIn}`);
    if (sources[inIndex] !== undefined) fail(`input ${inIndex} is both bound and packed`);
    sources[inIndex] = { type: 'pack', slot: slot };
  }

  const inputSources: InputSource[] = [];
  for (let i = 0; i < totalIn; i++) {
    const source = sources[i];
    if (source === undefined) return fail(`input ${i} is neither bound nor packed`);
    inputSources.push(source);
  }

  const unbound: number[] = [];
  for (let i = 0; i < totalOut; i++) {
    if (!outputBound[i]) unbound.push(i);
  }
  if (unbound.length !== 1) fail(`expected one final output, found ${unbound.length}`);

  // Kahn's algorithm over coder dependencies
  const numCoders = folder.coders.length;
  const pending: number[] = [];
  const dependents: number[][] = [];
  for (let i = 0; i < numCoders; i++) {
    pending.push(0);
    dependents.push([]);
  }
  for (let i = 0; i < totalIn; i++) {
    const source = inputSources[i];
    if (source.type !== 'coder') continue;
    const consumer = coderOfInput[i];
    const producer = coderOfOutput[source.outIndex];
    if (producer === consumer) fail(`coder ${consumer} feeds itself`);
    pending[consumer]++;
    dependents[producer].push(consumer);
  }

  const order: number[] = [];
  const done: boolean[] = [];
  for (let i = 0; i < numCoders; i++) done.push(false);
  while (order.length < numCoders) {
    let next = -1;
    for (let i = 0; i < numCoders; i++) {
      if (!done[i] && pending[i] === 0) {
        next = i;
        break;
      }
    }
    if (next < 0) fail('coder graph contains a cycle');

    done[next] = true;
    order.push(next);
    for (let i = 0; i < dependents[next].length; i++) pending[dependents[next][i]]--;
  }

  return {
    inStreamStart: inStreamStart,
    outStreamStart: outStreamStart,
    inputSources: inputSources,
    finalOutput: unbound[0],
    order: order,
  };
}

/**
 * Size of the folder's final decoded output.
 */
export function getFolderUnpackSize(folder: Folder, folderIndex?: number): number {
  const unbound = findUnboundOutputs(folder);
  if (unbound.length !== 1) {
    throw new MalformedFolderError(`expected one final output, found ${unbound.length}`, folderIndex);
  }
  const size = folder.unpackSizes[unbound[0]];
  if (size === undefined) {
    throw new MalformedFolderError(`no unpack size for output ${unbound[0]}`, folderIndex);
  }
  return size;
}
