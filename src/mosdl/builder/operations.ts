/**
 * Operation factories, one per interaction pattern
 */

import type {
  InvokeOperation,
  OperationError,
  ProgressOperation,
  PubSubOperation,
  RequestOperation,
  SendOperation,
  SubmitOperation,
} from '../spec/types.js'
import { toMessage, type MessageInput } from './elements.js'

export interface OperationOptions {
  comment?: string
  /** Operation supports replay */
  replay?: boolean
}

export interface ThrowingOperationOptions extends OperationOptions {
  errors?: OperationError[]
}

function base(name: string, number: number, options: OperationOptions | undefined) {
  const result: { name: string; number: number; comment?: string; supportInReplay?: boolean } = { name, number }
  if (options?.comment !== undefined) result.comment = options.comment
  if (options?.replay) result.supportInReplay = true
  return result
}

function withErrors<T extends { errors?: OperationError[] }>(op: T, options: ThrowingOperationOptions | undefined): T {
  if (options?.errors && options.errors.length > 0) {
    op.errors = options.errors
  }
  return op
}

export function send(name: string, number: number, body: MessageInput, options?: OperationOptions): SendOperation {
  return { ...base(name, number, options), pattern: 'SEND', messages: [toMessage(body)] }
}

export function submit(
  name: string,
  number: number,
  body: MessageInput,
  options?: ThrowingOperationOptions
): SubmitOperation {
  return withErrors<SubmitOperation>(
    { ...base(name, number, options), pattern: 'SUBMIT', messages: [toMessage(body)] },
    options
  )
}

export function request(
  name: string,
  number: number,
  req: MessageInput,
  res: MessageInput,
  options?: ThrowingOperationOptions
): RequestOperation {
  return withErrors<RequestOperation>(
    {
      ...base(name, number, options),
      pattern: 'REQUEST',
      messages: [toMessage(req), toMessage(res)],
    },
    options
  )
}

export function invoke(
  name: string,
  number: number,
  req: MessageInput,
  ack: MessageInput,
  res: MessageInput,
  options?: ThrowingOperationOptions
): InvokeOperation {
  return withErrors<InvokeOperation>(
    {
      ...base(name, number, options),
      pattern: 'INVOKE',
      messages: [toMessage(req), toMessage(ack), toMessage(res)],
    },
    options
  )
}

export function progress(
  name: string,
  number: number,
  req: MessageInput,
  ack: MessageInput,
  update: MessageInput,
  res: MessageInput,
  options?: ThrowingOperationOptions
): ProgressOperation {
  return withErrors<ProgressOperation>(
    {
      ...base(name, number, options),
      pattern: 'PROGRESS',
      messages: [toMessage(req), toMessage(ack), toMessage(update), toMessage(res)],
    },
    options
  )
}

export function pubsub(
  name: string,
  number: number,
  notify: MessageInput,
  options?: ThrowingOperationOptions
): PubSubOperation {
  return withErrors<PubSubOperation>(
    { ...base(name, number, options), pattern: 'PUBSUB', messages: [toMessage(notify)] },
    options
  )
}

/**
 * Operation factories grouped by pattern
 */
export const Op = {
  send,
  submit,
  request,
  invoke,
  progress,
  pubsub,
}
