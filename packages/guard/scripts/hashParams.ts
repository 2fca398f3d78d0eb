/* Prints the canonical JSON and params hash for an instance parameter file.
   Usage: npm run hash-params -- path/to/params.json */

import fs from 'fs'
import path from 'path'
import { canonicalize, hashParams } from '../src/utils/canonical'

function main() {
  const file = process.argv[2]
  if (!file) {
    console.error('usage: hashParams <params.json>')
    process.exit(1)
  }
  const params: unknown = JSON.parse(fs.readFileSync(path.resolve(file), 'utf8'))
  console.log('canonical:', canonicalize(params))
  console.log('paramsHash:', hashParams(params))
}

main()
