/** A text-to-speech backend. Implementations return MP3 bytes. */
export interface TtsProvider {
  readonly name: string
  /** Longest text a single request accepts; longer input is split by the caller. */
  readonly maxInputChars: number
  /** Credentials and configuration are present. */
  isAvailable(): boolean
  synthesize(text: string): Promise<Buffer>
}
