import { Body, Controller, Get, HttpCode, HttpStatus, Patch, Post } from '@nestjs/common';
import { SettingsService } from './settings.service';
import { UpdateSettingsDto } from './dto/update-settings.dto';

@Controller('settings')
export class SettingsController {
    constructor(private readonly settingsService: SettingsService) {}

    @Get()
    getSettings() {
        return this.settingsService.describe();
    }

    @Patch()
    updateSettings(@Body() body: UpdateSettingsDto) {
        this.settingsService.update(body);
        return this.settingsService.describe();
    }

    @Post('test-connection')
    @HttpCode(HttpStatus.OK)
    async testConnection() {
        return { checks: await this.settingsService.testConnection() };
    }
}
