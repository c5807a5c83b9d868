export { Command, Option, InvalidArgumentError } from 'commander'
