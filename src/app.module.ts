import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import configuration from './config/configuration';
import { BomModule } from './bom';
import { ExcelModule } from './excel/excel.module';
import { AppController } from './app.controller';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      envFilePath: ['.env.local', '.env'],
    }),
    ExcelModule,
    BomModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
