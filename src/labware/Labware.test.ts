import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';
import { fileURLToPath } from 'node:url';
import { CollectingSink } from '../diagnostics/DiagnosticSink.js';
import { EchoXmlError } from '../types/errors.js';
import { Labware } from './Labware.js';
import { createPlateInfo, PLATE_INFO_COLUMNS, UNKNOWN_PLATE_FORMAT } from './PlateInfo.js';
import type { PlateInfoRecord } from './PlateInfo.js';

const here = dirname(fileURLToPath(import.meta.url));
const fixture = (name: string) => join(here, 'fixtures', name);

const MINIMAL_384 = [
  '<EchoLabware>',
  '  <sourceplates>',
  '    <plateinfo platetype="384PP" plateformat="384PP" usage="SRC" manufacturer="Acme Labware"',
  '      lotnumber="L-1" partnumber="P-1" rows="16" cols="24" a1offsety="1124" centerspacingx="450"',
  '      centerspacingy="450" plateheight="1440" skirtheight="240" wellwidth="370" welllength="370"',
  '      wellcapacity="65" bottominset="0.5" centerwellposx="1123" centerwellposy="1124"/>',
  '  </sourceplates>',
  '  <destinationplates/>',
  '</EchoLabware>',
].join('\n');

function plateRecord(overrides: Partial<PlateInfoRecord> = {}): PlateInfoRecord {
  return {
    platetype: '96_Test',
    plateformat: '96',
    usage: 'DEST',
    manufacturer: 'Acme Labware',
    lotnumber: 'L-9',
    partnumber: 'P-9',
    rows: 8,
    cols: 12,
    a1offsety: 1124,
    centerspacingx: 900,
    centerspacingy: 900,
    plateheight: 1440,
    skirtheight: 240,
    wellwidth: 640,
    welllength: 640,
    wellcapacity: 300,
    bottominset: 1.5,
    centerwellposx: 1438,
    centerwellposy: 1124,
    ...overrides,
  };
}

function catchError(fn: () => unknown): EchoXmlError {
  try {
    fn();
  } catch (err) {
    if (err instanceof EchoXmlError) return err;
    throw err;
  }
  throw new Error('expected an EchoXmlError');
}

describe('Labware', () => {
  describe('reading ELWX files', () => {
    it('reads every plate with explicit fields', async () => {
      const labware = await Labware.fromFile(fixture('elwx_sample.xml'));
      expect(labware.variant).toBe('ELWX');
      expect(labware.keys()).toEqual(['384PP_DMSO2', '1536LDV_Dest']);

      const src = labware.get('384PP_DMSO2');
      expect(src.usage).toBe('SRC');
      expect(src.plateformat).toBe('384PP');
      expect(src.fluid).toBe('DMSO');
      expect(src.welllength).toBe(380);
      expect(src.maxvoltotal).toBe(12.5);
      expect(src.shape).toEqual([16, 24]);

      const dest = labware.get('1536LDV_Dest');
      expect(dest.usage).toBe('DEST');
      expect(dest.fluid).toBeUndefined();
      expect(dest.minwellvol).toBeUndefined();
      expect(dest.bottominset).toBe(1.25);
    });

    it('splits plates by usage', async () => {
      const labware = await Labware.fromFile(fixture('elwx_sample.xml'));
      expect(labware.sourcePlates.map((p) => p.platetype)).toEqual(['384PP_DMSO2']);
      expect(labware.destinationPlates.map((p) => p.platetype)).toEqual(['1536LDV_Dest']);
    });
  });

  describe('reading ELW files', () => {
    it('infers usage from the list and well length from well width', async () => {
      const labware = await Labware.fromFile(fixture('elw_sample.xml'));
      expect(labware.variant).toBe('ELW');
      expect(labware.plates.map((p) => [p.platetype, p.usage])).toEqual([
        ['384PP_AQ_BP', 'SRC'],
        ['6RES_AQ_BP2', 'SRC'],
        ['96_Greiner', 'DEST'],
      ]);
      for (const plate of labware.plates) {
        expect(plate.welllength).toBe(plate.wellwidth);
        expect(plate.plateformat).toBe(UNKNOWN_PLATE_FORMAT);
      }
    });

    it('records why the ELWX attempt was skipped', async () => {
      const sink = new CollectingSink();
      await Labware.fromFile(fixture('elw_sample.xml'), { sink });
      expect(sink.entries).toHaveLength(1);
      expect(sink.entries[0]?.level).toBe('debug');
      expect(sink.entries[0]?.message).toBe('Labware document is not ELWX');
      expect(sink.entries[0]?.context.code).toBe('MISSING_REQUIRED_FIELD');
    });

    it('writes ELW input back as ELWX', async () => {
      const labware = await Labware.fromFile(fixture('elw_sample.xml'));
      const reread = Labware.fromBytes(labware.toBytes());
      expect(reread.variant).toBe('ELWX');
      expect(reread.plates).toEqual(labware.plates);
      expect(labware.toXml()).toContain('<plateinfo platetype="96_Greiner" plateformat="UNKNOWN" usage="DEST"');
    });
  });

  it('round-trips through its own output', async () => {
    const labware = await Labware.fromFile(fixture('elwx_sample.xml'));
    const reread = Labware.fromBytes(labware.toXml({ indent: 0 }));
    expect(reread.keys()).toEqual(labware.keys());
    expect(reread.plates).toEqual(labware.plates);
  });

  it('reports the ELW error, with the ELWX error as cause, when neither variant matches', () => {
    const err = catchError(() =>
      Labware.fromBytes(
        '<EchoLabware><sourceplates><plateinfo platetype="x"/></sourceplates><destinationplates/></EchoLabware>'
      )
    );
    expect(err.code).toBe('MISSING_REQUIRED_FIELD');
    expect(err.field).toBe('manufacturer');
    expect(err.cause).toBeInstanceOf(EchoXmlError);
    expect(err.cause instanceof EchoXmlError ? err.cause.field : undefined).toBe('plateformat');
  });

  it('rejects documents that are not labware', () => {
    const err = catchError(() => Labware.fromBytes('<platesurvey/>'));
    expect(err.code).toBe('UNEXPECTED_ROOT');
  });

  describe('collection operations', () => {
    it('adds validated plates', () => {
      const labware = Labware.fromBytes(MINIMAL_384);
      const added = labware.add(plateRecord());
      expect(added.shape).toEqual([8, 12]);
      expect(labware.keys()).toEqual(['384PP', '96_Test']);
      expect(labware.has('96_Test')).toBe(true);
    });

    it('rejects a duplicate platetype and leaves the collection unchanged', () => {
      const labware = Labware.fromBytes(MINIMAL_384);
      const err = catchError(() => labware.add(plateRecord({ platetype: '384PP', usage: 'SRC' })));
      expect(err.code).toBe('DUPLICATE_KEY');
      expect(err.message).toBe('Plate of type 384PP already exists');
      expect(labware.size).toBe(1);
    });

    it('rejects invalid plates without adding them', () => {
      const labware = Labware.fromBytes(MINIMAL_384);
      const err = catchError(() => labware.add(plateRecord({ rows: -1 })));
      expect(err.code).toBe('INVALID_VALUE');
      expect(labware.size).toBe(1);
    });

    it('rejects duplicate platetypes on construction', () => {
      const plate = createPlateInfo(plateRecord());
      expect(() => new Labware([plate, plate])).toThrow('Plate of type 96_Test already exists');
    });

    it('reports lookups of unknown plate types', () => {
      const err = catchError(() => Labware.fromBytes(MINIMAL_384).get('1536LDV'));
      expect(err.code).toBe('LOOKUP_MISS');
    });

    it('returns frozen plate views', () => {
      const plate = Labware.fromBytes(MINIMAL_384).get('384PP');
      expect(Object.isFrozen(plate)).toBe(true);
    });
  });

  describe('toTable', () => {
    it('projects one row per plate with absent optional fields as null', () => {
      const labware = Labware.fromBytes(MINIMAL_384);
      const table = labware.toTable();
      expect(labware.get('384PP').shape).toEqual([16, 24]);
      expect(table.columns).toEqual(PLATE_INFO_COLUMNS);
      expect(table.rows).toHaveLength(1);
      expect(table.rows[0]).toMatchObject({
        platetype: '384PP',
        usage: 'SRC',
        rows: 16,
        cols: 24,
        bottominset: 0.5,
        fluid: null,
        minwellvol: null,
        maxwellvol: null,
        maxvoltotal: null,
        minvolume: null,
        dropvolume: null,
      });
    });

    it('declares column kinds from the field table', () => {
      const byName = new Map(PLATE_INFO_COLUMNS.map((c) => [c.name, c]));
      expect(PLATE_INFO_COLUMNS).toHaveLength(25);
      expect(byName.get('rows')).toEqual({ name: 'rows', kind: 'integer', nullable: false });
      expect(byName.get('dropvolume')).toEqual({ name: 'dropvolume', kind: 'float', nullable: true });
      expect(byName.get('fluid')).toEqual({ name: 'fluid', kind: 'string', nullable: true });
    });
  });

  describe('files', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'labware-test-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('writes ELWX files that read back unchanged', async () => {
      const labware = await Labware.fromFile(fixture('elwx_sample.xml'));
      const out = join(dir, 'out.elwx');
      await labware.toFile(out);
      const text = await readFile(out, 'utf-8');
      expect(text.startsWith('<?xml version="1.0" encoding="utf-8"?>\n<EchoLabware>')).toBe(true);
      expect((await Labware.fromFile(out)).plates).toEqual(labware.plates);
    });
  });
});
