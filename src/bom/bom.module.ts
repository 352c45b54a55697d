import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MulterModule } from '@nestjs/platform-express';
import { ExcelModule } from '../excel/excel.module';
import { TableLocatorService } from './table-locator.service';
import { HeaderResolverService } from './header-resolver.service';
import { TaxonomyService } from './taxonomy.service';
import { RecordTransformerService } from './record-transformer.service';
import { InvariantValidatorService } from './invariant-validator.service';
import { BomParserService } from './bom-parser.service';
import { BomController } from './bom.controller';

@Module({
  imports: [
    ExcelModule,
    // Fichiers reçus gardés en mémoire, taille bornée par la configuration
    MulterModule.registerAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        limits: { fileSize: configService.get<number>('bom.maxUploadBytes') },
      }),
    }),
  ],
  providers: [
    TableLocatorService,
    HeaderResolverService,
    TaxonomyService,
    RecordTransformerService,
    InvariantValidatorService,
    BomParserService,
  ],
  controllers: [BomController],
  exports: [BomParserService, TaxonomyService],
})
export class BomModule {}
