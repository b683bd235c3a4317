import { Data, Schema } from 'effect';

export class InvalidInputError extends Schema.TaggedError<InvalidInputError>(
  'InvalidInputError',
)('InvalidInputError', {
  message: Schema.String,
}) {}

export class InputReadError extends Data.TaggedError('InputReadError')<{
  message: string;
  cause?: unknown;
}> {}

export class OutputWriteError extends Data.TaggedError('OutputWriteError')<{
  message: string;
  cause?: unknown;
}> {}
