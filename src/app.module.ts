import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ServeStaticModule } from '@nestjs/serve-static';
import { join } from 'path';
import { ChatModule } from './logic/chat/chat.module';
import { SettingsModule } from './logic/settings/settings.module';
import { SystemLogModule } from './logic/system-log/system-log.module';
import { SocketGatewayModule } from './logic/socket-gateway/socket-gateway.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    ServeStaticModule.forRoot({
      rootPath: join(__dirname, '..', 'public'),
      renderPath: '/',
    }),
    SocketGatewayModule,
    SystemLogModule,
    SettingsModule,
    ChatModule,
  ],
})
export class AppModule {}
