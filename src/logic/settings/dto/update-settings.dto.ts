import { IsBoolean, IsInt, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator';

export class UpdateSettingsDto {
    @IsOptional()
    @IsString()
    openaiEndpoint?: string;

    @IsOptional()
    @IsString()
    openaiApiKey?: string;

    @IsOptional()
    @IsString()
    openaiDeployment?: string;

    @IsOptional()
    @IsString()
    openaiApiVersion?: string;

    @IsOptional()
    @IsString()
    searchEndpoint?: string;

    @IsOptional()
    @IsString()
    searchApiKey?: string;

    @IsOptional()
    @IsString()
    searchIndex?: string;

    @IsOptional()
    @IsString()
    speechKey?: string;

    @IsOptional()
    @IsString()
    speechRegion?: string;

    @IsOptional()
    @IsString()
    speechVoice?: string;

    @IsOptional()
    @IsString()
    @MaxLength(4000)
    systemPrompt?: string;

    @IsOptional()
    @IsInt()
    @Min(0)
    @Max(100)
    historyWindow?: number;

    @IsOptional()
    @IsBoolean()
    voiceOutput?: boolean;
}
