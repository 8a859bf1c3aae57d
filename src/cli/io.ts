/**
 * CLI File I/O
 *
 * File reading and writing utilities for the CLI.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'

/**
 * Read and parse a JSON file.
 */
export async function readJsonFile(path: string): Promise<unknown> {
  const content = await readFile(path, 'utf-8')
  try {
    return JSON.parse(content)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new Error(`Could not parse ${path}: ${message}`)
  }
}

/**
 * Write a value as pretty JSON to a file, or to stdout when target is 'stdout'.
 */
export async function writeJsonOutput(target: string, value: unknown): Promise<void> {
  const json = JSON.stringify(value, null, 2)
  if (target === 'stdout') {
    console.log(json)
    return
  }
  await mkdir(dirname(target), { recursive: true })
  await writeFile(target, json)
}
