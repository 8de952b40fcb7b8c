import { z } from 'zod';
import { BadParamsError } from '../lib/errors';
import { defineRpcMethod } from '../rpc/method';

const OperandSchema = z.number().finite();

function operand(name: string, value: unknown): number {
  const parsed = OperandSchema.safeParse(value);
  if (!parsed.success) {
    throw new BadParamsError(`Parameter ${name} must be a finite number`);
  }
  return parsed.data;
}

export const addMethod = defineRpcMethod((a: unknown, b: unknown): number => operand('a', a) + operand('b', b), {
  name: 'math.add',
  params: ['a', 'b'],
  signature: ['double', 'double', 'double'],
  help: 'Adds two numbers and returns the sum',
});

export const echoMethod = defineRpcMethod((value: unknown): unknown => value, {
  name: 'echo',
  params: ['value'],
  help: 'Returns its argument unchanged',
});
