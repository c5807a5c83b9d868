export { default as OpenAI } from 'openai'
export type { ChatCompletion, ChatCompletionMessageParam } from 'openai/resources/chat/completions.js'
