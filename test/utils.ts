import fs from 'node:fs';

/**
 * Load a JSON table from test/data.
 *
 * @param name File name, without directory.
 * @returns Map from the string form of each input to its expected output.
 */
export function readTable<T>(name: string): Record<string, T> {
  const text = fs.readFileSync(new URL(`./data/${name}`, import.meta.url), 'utf8');
  return JSON.parse(text);
}
