/**
 * Example: fixed-output fetches from file hosts
 *
 * Each derivation is identified by its OUTPUT hash, not by where it comes
 * from. The fetch may use the network because the result is checked
 * against the declared hash before it is published.
 */

import { fetchFromBuzzheavier, fetchFromGofile, fetchFromMega, mkUnpack, build } from '../src';

// One file picked out of a Gofile folder; only that file is downloaded
export const notes = fetchFromGofile({
  url: 'https://gofile.io/d/AbC123',
  subPath: 'notes.txt',
  hash: 'sha256-47DEQpj8HBSa+/TImW+5JCeuQeRkm5NMpJWZG3hSuFU=',
});

// A whole Mega folder, hashed as a tree
export const assets = fetchFromMega({
  url: 'https://mega.nz/folder/XyZ123#placeholder-key',
  name: 'assets',
  hash: 'sha256-47DEQpj8HBSa+/TImW+5JCeuQeRkm5NMpJWZG3hSuFU=',
});

// An archive on Buzzheavier, extracted before hashing
export const sources = mkUnpack(
  fetchFromBuzzheavier({
    id: 'abc123def456',
    name: 'sources',
    hash: 'sha256-47DEQpj8HBSa+/TImW+5JCeuQeRkm5NMpJWZG3hSuFU=',
  })
);

export async function main(): Promise<void> {
  for (const drv of [notes, assets, sources]) {
    const artifact = await build(drv, { retries: 2 });
    console.log(`${drv.name}: ${artifact.path}`);
  }
}
