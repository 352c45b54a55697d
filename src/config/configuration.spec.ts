import configuration from './configuration';

describe('configuration', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.BOM_EXCLUSION_PRESET;
    delete process.env.BOM_EXCLUDE_DESCRIPTION_TERMS;
    delete process.env.BOM_EXCLUDE_COMPONENT_TYPES;
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  it('should exclude nothing by default', () => {
    const { bom } = configuration();

    expect(bom.excludeDescriptionTerms).toEqual([]);
    expect(bom.excludeComponentTypes).toEqual([]);
  });

  it('should load the electrical exclusion preset', () => {
    process.env.BOM_EXCLUSION_PRESET = 'electrical';

    const { bom } = configuration();

    expect(bom.excludeDescriptionTerms).toEqual(['Glue', 'Solder', 'Compound', 'Conformal', 'Coating', 'Screw', 'Wire', 'AWG']);
    expect(bom.excludeComponentTypes).toEqual(['PCB', 'Wire']);
  });

  it('should let explicit lists override the preset', () => {
    process.env.BOM_EXCLUSION_PRESET = 'electrical';
    process.env.BOM_EXCLUDE_COMPONENT_TYPES = 'Wire, Label';

    expect(configuration().bom.excludeComponentTypes).toEqual(['Wire', 'Label']);
  });

  it('should fall back to no exclusions for an unknown preset', () => {
    process.env.BOM_EXCLUSION_PRESET = 'mechanical';

    expect(configuration().bom.excludeDescriptionTerms).toEqual([]);
  });
});
