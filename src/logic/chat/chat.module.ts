import { Module } from '@nestjs/common';
import { ChatService } from './chat.service';
import { ChatController } from './chat.controller';
import { OpenAIModule } from '../openai/openai.module';
import { SearchModule } from '../search/search.module';
import { SpeechModule } from '../speech/speech.module';
import { SettingsModule } from '../settings/settings.module';
import { SystemLogModule } from '../system-log/system-log.module';
import { SocketGatewayModule } from '../socket-gateway/socket-gateway.module';

@Module({
    imports: [
        OpenAIModule,
        SearchModule,
        SpeechModule,
        SettingsModule,
        SystemLogModule,
        SocketGatewayModule,
    ],
    controllers: [ChatController],
    providers: [ChatService],
    exports: [ChatService],
})
export class ChatModule {}
