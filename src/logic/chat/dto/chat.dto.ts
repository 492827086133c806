import { Transform } from 'class-transformer';
import { IsBoolean, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

// Multipart fields arrive as strings.
const toBoolean = ({ value }: { value: unknown }) => {
    if (value === 'true' || value === true) return true;
    if (value === 'false' || value === false) return false;
    return value;
};

export class ChatTextDto {
    @IsString()
    @IsNotEmpty()
    @MaxLength(4000)
    text!: string;

    @IsOptional()
    @IsBoolean()
    speak?: boolean;
}

export class ChatVoiceDto {
    @IsOptional()
    @Transform(toBoolean)
    @IsBoolean()
    speak?: boolean;
}
