import {
  BadRequestException,
  HttpStatus,
  ValidationError,
  ValidationPipeOptions,
} from '@nestjs/common';

type ValidationErrorTree = { [property: string]: string | ValidationErrorTree };

function flattenErrors(errors: ValidationError[]): ValidationErrorTree {
  const tree: ValidationErrorTree = {};
  for (const error of errors) {
    const children = error.children ?? [];
    tree[error.property] =
      children.length > 0
        ? flattenErrors(children)
        : Object.values(error.constraints ?? {}).join(', ');
  }
  return tree;
}

/**
 * Query parameters are transformed to their DTO types; unknown ones are dropped.
 */
const validationOptions: ValidationPipeOptions = {
  transform: true,
  whitelist: true,
  errorHttpStatusCode: HttpStatus.BAD_REQUEST,
  exceptionFactory: (errors: ValidationError[]) =>
    new BadRequestException({
      status: HttpStatus.BAD_REQUEST,
      errors: flattenErrors(errors),
    }),
};

export default validationOptions;
