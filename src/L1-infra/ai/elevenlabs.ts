export { ElevenLabsClient } from '@elevenlabs/elevenlabs-js'
