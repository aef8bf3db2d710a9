import { Type, applyDecorators } from '@nestjs/common';
import {
  ApiExtraModels,
  ApiOkResponse,
  ApiProperty,
  getSchemaPath,
} from '@nestjs/swagger';

/**
 * Standard structure for all successful API responses.
 * Only used to describe the envelope in the OpenAPI document.
 */
export class StandardResponseDto<T> {
  @ApiProperty({ example: true })
  success!: boolean;

  data!: T;

  @ApiProperty({ example: '2025-01-01T00:00:00.000Z' })
  timestamp!: string;
}

/**
 * Documents a single object response wrapped in StandardResponseDto.
 *
 * @param model - The class documented inside 'data'
 */
export const ApiStandardResponse = <TModel extends Type<unknown>>(model: TModel) => {
  return applyDecorators(
    ApiExtraModels(StandardResponseDto, model),
    ApiOkResponse({
      schema: {
        allOf: [
          { $ref: getSchemaPath(StandardResponseDto) },
          {
            properties: {
              data: {
                $ref: getSchemaPath(model),
              },
            },
          },
        ],
      },
    }),
  );
};

/**
 * Documents an array response wrapped in StandardResponseDto.
 *
 * @param model - The class documented inside the 'data' array
 */
export const ApiStandardResponseArray = <TModel extends Type<unknown>>(model: TModel) => {
  return applyDecorators(
    ApiExtraModels(StandardResponseDto, model),
    ApiOkResponse({
      schema: {
        allOf: [
          { $ref: getSchemaPath(StandardResponseDto) },
          {
            properties: {
              data: {
                type: 'array',
                items: { $ref: getSchemaPath(model) },
              },
            },
          },
        ],
      },
    }),
  );
};
