// Types
export * from './types';

// Services
export { TableLocatorService, NO_BEST_MATCH_ROW } from './table-locator.service';
export { HeaderResolverService, LabelResolution, ResolveTableOptions } from './header-resolver.service';
export { TaxonomyService, Taxonomy, ComponentTypeMatch } from './taxonomy.service';
export {
  RecordTransformerService,
  parseDesignators,
  parseQuantity,
  splitLines,
} from './record-transformer.service';
export { InvariantValidatorService } from './invariant-validator.service';
export { BomParserService, NormalizedRecords } from './bom-parser.service';

// Module
export { BomModule } from './bom.module';
