export { default as Anthropic } from '@anthropic-ai/sdk'
export type { MessageParam, TextBlock } from '@anthropic-ai/sdk/resources/messages.js'
