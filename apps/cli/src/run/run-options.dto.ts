import { IsBoolean, IsNotEmpty, IsNumberString, IsOptional, IsString, ValidateIf, validateSync } from 'class-validator';
import {
  InvalidConcurrencyError,
  InvalidOptionError,
  MissingOrUnreadableScriptError,
  PreflightError,
} from '../common/errors';

/** Options as commander hands them over: every value is still a string. */
export interface CliOptions {
  hosts?: string;
  script?: string;
  processes?: string;
  jumpbox?: string;
  connectTimeout?: string;
  commandTimeout?: string;
  hostKeyChecking?: string;
  user?: string;
  port?: string;
  identity?: string;
  config?: string;
  listHosts?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

export class RunOptionsDto {
  @IsString()
  @IsNotEmpty()
  hosts!: string;

  @ValidateIf((o: RunOptionsDto) => !o.listHosts)
  @IsString()
  @IsNotEmpty()
  script?: string;

  @ValidateIf((o: RunOptionsDto) => !o.listHosts)
  @IsNumberString({ no_symbols: true })
  processes?: string;

  @IsString()
  @IsNotEmpty()
  @IsOptional()
  jumpbox?: string;

  @IsBoolean()
  @IsOptional()
  listHosts?: boolean;
}

export type RunRequest =
  | { mode: 'list'; hosts: string }
  | { mode: 'run'; hosts: string; script: string; concurrency: number; jumpbox?: string };

// first failure reported, in this order
const PRIORITY = ['script', 'hosts', 'processes'];

export function toRunRequest(options: CliOptions): RunRequest {
  const dto = Object.assign(new RunOptionsDto(), {
    hosts: options.hosts,
    script: options.script,
    processes: options.processes,
    jumpbox: options.jumpbox,
    listHosts: options.listHosts,
  });

  const errors = validateSync(dto).sort((a, b) => rank(a.property) - rank(b.property));
  if (errors.length > 0) {
    throw preflightErrorFor(errors[0].property, dto);
  }

  if (dto.listHosts) return { mode: 'list', hosts: dto.hosts };

  const concurrency = Number(dto.processes);
  if (!dto.script) throw new MissingOrUnreadableScriptError(undefined, 'is required');
  if (!Number.isSafeInteger(concurrency) || concurrency < 1) throw new InvalidConcurrencyError(dto.processes);
  return { mode: 'run', hosts: dto.hosts, script: dto.script, concurrency, jumpbox: dto.jumpbox };
}

function rank(property: string): number {
  const i = PRIORITY.indexOf(property);
  return i === -1 ? PRIORITY.length : i;
}

function preflightErrorFor(property: string, dto: RunOptionsDto): PreflightError {
  switch (property) {
    case 'script':
      return new MissingOrUnreadableScriptError(undefined, 'is required');
    case 'hosts':
      return new PreflightError('InvalidHostPattern', '--hosts is required');
    case 'processes':
      return new InvalidConcurrencyError(dto.processes);
    case 'jumpbox':
      return new InvalidOptionError('--jumpbox must not be empty');
    default:
      return new InvalidOptionError(`invalid value for --${property}`);
  }
}
