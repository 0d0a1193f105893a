import fs from 'node:fs/promises'
import { bytesToHex, hexToBytes, isHex } from 'viem'
import { loadConfig } from './shared/config.js'
import { logger } from './shared/logger.js'
import { createCelestiaDAApp, type CelestiaDAApp } from './app.js'
import { collectPreimages } from './preimage-store/collect.js'
import { deserializeBlobPointer } from './wire-codec/framing.js'
import { describeBlobPointer } from './wire-codec/blob-pointer.js'

const USAGE = `Usage:
  celestia-da store <file>                    post a batch and print its serialized pointer
  celestia-da read <pointer-hex> [out-file]   fetch a batch and record its row preimages
  celestia-da verify <pointer-hex> <begin> <end> [nonce]
                                              check the Blobstream attestation of a pointer`

const parsePointer = (value: string | undefined) => {
  if (!value || !isHex(value)) {
    throw new Error(`expected a 0x-prefixed serialized pointer, got ${value ?? 'nothing'}`)
  }
  return deserializeBlobPointer(hexToBytes(value))
}

const parseHeight = (name: string, value: string | undefined): bigint => {
  if (!value || !/^\d+$/.test(value)) {
    throw new Error(`${name} must be a non-negative integer, got ${value ?? 'nothing'}`)
  }
  return BigInt(value)
}

const runCommand = async (app: CelestiaDAApp, args: string[], signal: AbortSignal) => {
  const [command, ...rest] = args
  switch (command) {
    case 'store': {
      const [file] = rest
      if (!file) throw new Error(USAGE)
      const message = await fs.readFile(file)
      const pointer = await app.da.store(message, { signal })
      await app.pointers.save(pointer)
      console.log(bytesToHex(app.da.serialize(pointer)))
      return
    }
    case 'read': {
      const [serialized, outFile] = rest
      const pointer = parsePointer(serialized)
      const { onHash, entries } = collectPreimages()
      const { data, squareData } = await app.da.read(pointer, { signal, onHash })
      await app.preimages.recordAll(entries)
      logger.info(`[CLI] Read rows ${squareData.startRow}-${squareData.endRow}, recorded ${entries.length} preimages`)
      if (outFile) {
        await fs.writeFile(outFile, data)
      } else {
        process.stdout.write(data)
      }
      return
    }
    case 'verify': {
      const [serialized, begin, end, nonce] = rest
      const pointer = parsePointer(serialized)
      const options = nonce === undefined ? { signal } : { signal, tupleRootNonce: parseHeight('nonce', nonce) }
      const verified = await app.da.verify(pointer, parseHeight('begin', begin), parseHeight('end', end), options)
      await app.pointers.save(pointer)
      await app.pointers.recordVerification(pointer, verified)
      logger.info(`[CLI] ${describeBlobPointer(pointer)} attested at nonce ${pointer.tupleRootNonce}: ${verified}`)
      console.log(verified ? 'verified' : 'not verified')
      return
    }
    default:
      throw new Error(USAGE)
  }
}

const main = async () => {
  const controller = new AbortController()
  const cancel = () => {
    logger.info('[CLI] Cancelling...')
    controller.abort()
  }
  process.on('SIGINT', cancel)
  process.on('SIGTERM', cancel)

  const config = loadConfig()
  const app = await createCelestiaDAApp(config)
  try {
    await runCommand(app, process.argv.slice(2), controller.signal)
  } finally {
    await app.close()
  }
}

main().catch((error) => {
  logger.error('Command failed:', error)
  process.exit(1)
})
