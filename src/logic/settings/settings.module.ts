import { Module } from '@nestjs/common';
import { SettingsService } from './settings.service';
import { SettingsController } from './settings.controller';
import { OpenAIModule } from '../openai/openai.module';
import { SearchModule } from '../search/search.module';
import { SpeechModule } from '../speech/speech.module';
import { SystemLogModule } from '../system-log/system-log.module';

@Module({
    imports: [OpenAIModule, SearchModule, SpeechModule, SystemLogModule],
    controllers: [SettingsController],
    providers: [SettingsService],
    exports: [SettingsService],
})
export class SettingsModule {}
