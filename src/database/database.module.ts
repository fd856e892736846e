import { Module, Global } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { ConfigModule } from './config.module';
import { ConfigService } from './config.service';

@Global()
@Module({
  imports: [
    ConfigModule,
    MongooseModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        uri: configService.mongoUri,
        // unique indexes enforce one ticket per user per week and unique ticket numbers
        autoIndex: true,
      }),
      inject: [ConfigService],
    }),
  ],
  exports: [MongooseModule, ConfigModule],
})
export class DatabaseModule {}
