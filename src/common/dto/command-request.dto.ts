import { Type, plainToInstance } from 'class-transformer';
import {
  IsArray,
  IsBoolean,
  IsEnum,
  IsInt,
  IsOptional,
  IsString,
  Matches,
  Min,
  ValidationError,
  validateSync,
} from 'class-validator';
import { InvalidRequestError } from '../errors/clusterscope.errors';
import { EndpointKind } from '../types/endpoint-kind';

export enum Operation {
  SNAPSHOT = 'snapshot',
  LIST = 'list',
  PRINT = 'print',
  DIFF = 'diff',
  ADHOC_DIFF = 'adhoc-diff',
}

export const DEFAULT_SQL_LENGTH = 80;
export const DEFAULT_LOG_SEVERITY = 'WEF';

export class CommandRequestDto {
  @IsEnum(Operation)
  operation!: Operation;

  @IsString()
  @IsOptional()
  hosts?: string;

  @IsString()
  @IsOptional()
  ports?: string;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @IsOptional()
  parallel?: number;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @IsOptional()
  begin?: number;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @IsOptional()
  end?: number;

  /** Snapshot to print from; a live pass is printed when absent. */
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @IsOptional()
  snapshot?: number;

  @IsString()
  @IsOptional()
  statNameMatch?: string;

  @IsString()
  @IsOptional()
  tableNameMatch?: string;

  @IsString()
  @IsOptional()
  hostnameMatch?: string;

  @IsBoolean()
  gaugesEnable: boolean = false;

  @IsBoolean()
  detailsEnable: boolean = false;

  @IsBoolean()
  silent: boolean = false;

  @IsBoolean()
  includeUnchanged: boolean = false;

  @IsBoolean()
  disableThreads: boolean = false;

  @IsString()
  comment: string = '';

  @IsArray()
  @IsEnum(EndpointKind, { each: true, message: 'each kind must be a known endpoint kind' })
  kinds: EndpointKind[] = [];

  @IsString()
  @IsOptional()
  uuid?: string;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  sqlLength: number = DEFAULT_SQL_LENGTH;

  @IsString()
  @Matches(/^[IWEF]*$/i, { message: 'logSeverity may only contain the letters I, W, E and F' })
  logSeverity: string = DEFAULT_LOG_SEVERITY;
}

function describeErrors(errors: ValidationError[], parent = ''): string[] {
  return errors.flatMap((error) => {
    const property = parent ? `${parent}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((message) => `${property}: ${message}`);
    return [...own, ...describeErrors(error.children ?? [], property)];
  });
}

function requestProblems(request: CommandRequestDto): string[] {
  const problems: string[] = [];
  switch (request.operation) {
    case Operation.DIFF:
      if (request.begin === undefined || request.end === undefined) {
        problems.push('diff needs both --begin and --end');
      } else if (request.begin >= request.end) {
        problems.push(`begin (${request.begin}) must be lower than end (${request.end})`);
      }
      break;
    case Operation.PRINT:
      if (request.kinds.length !== 1) {
        problems.push('print takes exactly one kind');
      }
      break;
    default:
      break;
  }
  return problems;
}

/** Validates a plain command request; nothing has been fetched or read when this throws. */
export function parseCommandRequest(plain: Record<string, unknown>): CommandRequestDto {
  const request = plainToInstance(CommandRequestDto, plain, { exposeUnsetFields: false });
  const fieldErrors = describeErrors(validateSync(request));
  if (fieldErrors.length > 0) {
    throw new InvalidRequestError('Invalid request', fieldErrors);
  }
  const problems = requestProblems(request);
  if (problems.length > 0) {
    throw new InvalidRequestError('Invalid request', problems);
  }
  return request;
}
