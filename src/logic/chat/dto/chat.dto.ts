import { Transform, Type } from 'class-transformer';
import {
    IsArray,
    IsInt,
    IsNotEmpty,
    IsOptional,
    IsString,
    Matches,
    Max,
    MaxLength,
    Min,
    ValidateNested,
} from 'class-validator';

const trim = ({ value }: { value: unknown }) => (typeof value === 'string' ? value.trim() : value);
// blank ids count as absent so the controller generates one
const trimToUndefined = ({ value }: { value: unknown }) => (typeof value === 'string' ? value.trim() || undefined : value);

export class PatientContextDto {
    @IsOptional()
    @IsInt()
    @Min(0)
    @Max(130)
    age?: number;

    @IsOptional()
    @IsString()
    sex?: string;

    @IsOptional()
    @IsInt()
    @Min(0)
    @Max(10)
    painScale?: number;

    @IsOptional()
    @IsArray()
    @IsString({ each: true })
    medications?: string[];

    @IsOptional()
    @IsArray()
    @IsString({ each: true })
    conditions?: string[];

    @IsOptional()
    @IsArray()
    @IsString({ each: true })
    allergies?: string[];

    @IsOptional()
    @IsString()
    durationText?: string;
}

export class ChatRequestDto {
    @Transform(trim)
    @IsString()
    @IsNotEmpty({ message: 'text must describe your symptoms' })
    @MaxLength(4000)
    text!: string;

    @IsOptional()
    @Transform(trimToUndefined)
    @Matches(/^[A-Za-z0-9_-]{1,64}$/, { message: 'sessionId may only contain letters, digits, "-" and "_"' })
    sessionId?: string;

    @IsOptional()
    @ValidateNested()
    @Type(() => PatientContextDto)
    patient?: PatientContextDto;
}

export class HistoryQueryDto {
    @IsString()
    @IsNotEmpty()
    sessionId!: string;
}
