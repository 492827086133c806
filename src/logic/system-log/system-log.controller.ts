import { Controller, Delete, Get, HttpCode, HttpStatus, Query } from '@nestjs/common';
import { SystemLogService } from './system-log.service';
import { LogQueryDto } from './dto/log-query.dto';

@Controller('logs')
export class SystemLogController {
    constructor(private readonly systemLog: SystemLogService) { }

    @Get()
    getLogs(@Query() query: LogQueryDto) {
        return this.systemLog.entries(query.limit);
    }

    @Delete()
    @HttpCode(HttpStatus.NO_CONTENT)
    clearLogs() {
        this.systemLog.clear();
    }
}
