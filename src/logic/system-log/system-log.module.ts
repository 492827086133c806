import { Module } from '@nestjs/common';
import { SystemLogService } from './system-log.service';
import { SystemLogController } from './system-log.controller';
import { SocketGatewayModule } from '../socket-gateway/socket-gateway.module';

@Module({
    imports: [SocketGatewayModule],
    controllers: [SystemLogController],
    providers: [SystemLogService],
    exports: [SystemLogService],
})
export class SystemLogModule {}
