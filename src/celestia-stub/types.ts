export type LocalFileStorageConfig = {
  dataDir: string
}

export type DataAvailabilityStubWriter = {
  store: (message: Uint8Array) => Promise<Uint8Array>
}

export type DataAvailabilityStubReader = {
  read: (serialized: Uint8Array) => Promise<Uint8Array>
}
