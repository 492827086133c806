import { Module } from '@nestjs/common';
import { OpenAIService } from './openai.service';
import { COMPLETION_CLIENT_FACTORY, createAzureOpenAIClient } from './openai.client';

@Module({
    providers: [
        OpenAIService,
        { provide: COMPLETION_CLIENT_FACTORY, useValue: createAzureOpenAIClient },
    ],
    exports: [OpenAIService],
})
export class OpenAIModule {}
