import {
    BadRequestException,
    Body,
    Controller,
    Delete,
    Get,
    HttpCode,
    HttpStatus,
    NotFoundException,
    Param,
    ParseUUIDPipe,
    Post,
    StreamableFile,
    UploadedFile,
    UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { ChatService, TurnResult, turnView } from './chat.service';
import { ChatTextDto, ChatVoiceDto } from './dto/chat.dto';

const MAX_UPLOAD_BYTES = 10 * 1024 * 1024;

@Controller('chat')
export class ChatController {

    constructor(private readonly chatService: ChatService) {}

    private reply(result: TurnResult) {
        return {
            transcript: result.transcript ?? null,
            reply: result.text,
            audioUrl: result.audio ? turnView(result.assistantTurn).audioUrl : null,
            turns: [turnView(result.userTurn), turnView(result.assistantTurn)],
        };
    }

    @Post()
    async chat(@Body() body: ChatTextDto) {
        const result = await this.chatService.handleTurn({ kind: 'text', text: body.text }, { speak: body.speak });
        return this.reply(result);
    }

    @Post('voice')
    @UseInterceptors(FileInterceptor('audio', { limits: { fileSize: MAX_UPLOAD_BYTES } }))
    async voice(@UploadedFile() file: Express.Multer.File | undefined, @Body() body: ChatVoiceDto) {
        if (!file?.buffer?.length) {
            throw new BadRequestException('No audio uploaded');
        }
        const result = await this.chatService.handleTurn({ kind: 'audio', audio: file.buffer, mimeType: file.mimetype }, { speak: body.speak });
        return this.reply(result);
    }

    @Get('history')
    getHistory() {
        return this.chatService.history().map(turnView);
    }

    @Delete('history')
    @HttpCode(HttpStatus.NO_CONTENT)
    clearHistory() {
        this.chatService.clearHistory();
    }

    @Get('turns/:id/audio')
    getAudio(@Param('id', ParseUUIDPipe) id: string) {
        const audio = this.chatService.audioFor(id);
        if (!audio) {
            throw new NotFoundException('No audio for this turn');
        }
        return new StreamableFile(audio.data, { type: audio.mimeType, length: audio.data.length });
    }
}
