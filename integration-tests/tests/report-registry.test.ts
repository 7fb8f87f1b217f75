/**
 * Report Schema Registry Tests
 *
 * Contract lookup, tag parsing and validation of IKC, AKH and generic records.
 */

import {
  checkReport,
  getAvailableReportTypes,
  getReportDefinition,
  getReportSchema,
  getReportTemplate,
  parseReportType,
  validateReport,
  UnknownReportTypeError,
} from '@labparse/shared';
import { loadFixture, setPath, unsetPath } from './helpers';

describe('Report Schema Registry', () => {
  describe('parseReportType', () => {
    it('should accept known tags case-insensitively', () => {
      expect(parseReportType('IKC')).toBe('IKC');
      expect(parseReportType('akh')).toBe('AKH');
      expect(parseReportType(' generic ')).toBe('GENERIC');
    });

    it('should reject unknown tags with UnknownReportTypeError', () => {
      expect(() => parseReportType('XYZ')).toThrow(UnknownReportTypeError);
      expect(() => parseReportType('XYZ')).toThrow(
        'Unknown report type "XYZ". Expected one of: IKC, AKH, GENERIC'
      );
    });

    it('should not fall back to a default for an empty tag', () => {
      expect(() => parseReportType('')).toThrow(UnknownReportTypeError);
    });
  });

  describe('getReportDefinition', () => {
    it('should map each tag to its own contract', () => {
      expect(getReportDefinition('IKC').schemaFile).toBe('ikc_report.schema.json');
      expect(getReportDefinition('AKH').schemaFile).toBe('akh_report.schema.json');
      expect(getReportDefinition('GENERIC').schemaFile).toBe('generic_report.schema.json');
    });

    it('should list every target with the generic fallback last', () => {
      expect(getAvailableReportTypes()).toEqual(['IKC', 'AKH', 'GENERIC']);
    });

    it('should load the IKC schema with all thirteen sections required', () => {
      const schema = getReportSchema('IKC');
      expect(schema.properties.lab_result.required).toHaveLength(13);
      expect(schema.required).toEqual([
        'report_id',
        'project',
        'patient_id',
        'daily_id',
        'date',
        'time',
        'lab_result',
      ]);
    });

    it('should pair each tag with a template of the same type', () => {
      expect(getReportTemplate('ikc').reportType).toBe('IKC');
      expect(getReportTemplate('AKH').reportType).toBe('AKH');
    });
  });

  describe('IKC validation', () => {
    it('should accept a complete report', () => {
      const check = checkReport('IKC', loadFixture('ikc-report.json'));

      expect(check.valid).toBe(true);
      if (check.valid) {
        expect(check.report.lab_result.electrolyte_and_water_balance.sodium.result).toBe('140');
        expect(check.report.lab_result.sexual_hormones.lh).toBeNull();
      }
    });

    it('should reject a report missing patient_id', () => {
      const report = loadFixture('ikc-report.json');
      delete report.patient_id;

      const result = validateReport('IKC', report);

      expect(result.valid).toBe(false);
      expect(result.errors).toContain("/: must have required property 'patient_id'");
    });

    it('should reject a gender outside M and W', () => {
      const report = loadFixture('ikc-report.json');
      report.gender = 'X';

      const result = validateReport('IKC', report);

      expect(result.valid).toBe(false);
      expect(result.errors).toContain('/gender: must be equal to one of the allowed values');
    });

    it('should accept a null gender', () => {
      const report = loadFixture('ikc-report.json');
      report.gender = null;

      expect(validateReport('IKC', report).valid).toBe(true);
    });

    it('should reject a missing analyte inside a section', () => {
      const report = loadFixture('ikc-report.json');
      unsetPath(report, ['lab_result', 'kidney', 'creatinine']);

      const result = validateReport('IKC', report);

      expect(result.valid).toBe(false);
      expect(result.errors).toContain("/lab_result/kidney: must have required property 'creatinine'");
    });

    it('should fill an omitted section caption with its default', () => {
      const report = loadFixture('ikc-report.json');
      unsetPath(report, ['lab_result', 'inflammation', 'caption']);

      const check = checkReport('IKC', report);

      expect(check.valid).toBe(true);
      if (check.valid) {
        expect(check.report.lab_result.inflammation.caption).toBe('Entzündung');
      }
    });

    it('should default out_of_range to false when omitted', () => {
      const report = loadFixture('ikc-report.json');
      unsetPath(report, ['lab_result', 'inflammation', 'crp', 'out_of_range']);

      const check = checkReport('IKC', report);

      expect(check.valid).toBe(true);
      if (check.valid) {
        expect(check.report.lab_result.inflammation.crp.out_of_range).toBe(false);
      }
    });

    it('should default out_of_range on a listed female hormone', () => {
      const report = loadFixture('ikc-report.json');
      setPath(report, ['lab_result', 'sexual_hormones', 'lh'], {
        caption: 'LH',
        result: '5.1',
        unit: 'U/L',
        reference: '1.7 - 8.6',
        extra: 'not part of the record',
      });

      const check = checkReport('IKC', report);

      expect(check.valid).toBe(true);
      if (check.valid) {
        expect(check.report.lab_result.sexual_hormones.lh).toEqual({
          caption: 'LH',
          result: '5.1',
          unit: 'U/L',
          reference: '1.7 - 8.6',
          out_of_range: false,
        });
        expect(check.report.lab_result.sexual_hormones.fsh).toBeNull();
      }
    });

    it('should reject a listed female hormone without a result', () => {
      const report = loadFixture('ikc-report.json');
      setPath(report, ['lab_result', 'sexual_hormones', 'lh'], { caption: 'LH', unit: 'U/L', reference: '1.7 - 8.6' });

      const result = validateReport('IKC', report);

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual(["/lab_result/sexual_hormones/lh: must have required property 'result'"]);
    });

    it('should drop properties the contract does not declare', () => {
      const report = loadFixture('ikc-report.json');
      report.notes = 'not part of the record';

      const check = checkReport('IKC', report);

      expect(check.valid).toBe(true);
      expect(report).not.toHaveProperty('notes');
    });

    it('should survive a serialize and re-validate round trip', () => {
      const first = checkReport('IKC', loadFixture('ikc-report.json'));
      expect(first.valid).toBe(true);
      if (!first.valid) return;

      const reparsed: unknown = JSON.parse(JSON.stringify(first.report, null, 2));
      const second = checkReport('IKC', reparsed);

      expect(second.valid).toBe(true);
      expect(reparsed).toEqual(first.report);
    });
  });

  describe('AKH validation', () => {
    it('should accept a complete report', () => {
      const check = checkReport('AKH', loadFixture('akh-report.json'));

      expect(check.valid).toBe(true);
      if (check.valid) {
        expect(check.report.report_id).toBe('AKH_12345');
        expect(check.report.gender).toBe('M');
      }
    });

    it('should reject an IKC report against the AKH contract', () => {
      const result = validateReport('AKH', loadFixture('ikc-report.json'));

      expect(result.valid).toBe(false);
    });
  });

  describe('Generic validation', () => {
    it('should accept a dynamic list of sections', () => {
      const report = {
        report_id: 'LAB_1',
        project: 'Cohort A',
        patient_id: 'P-0002',
        daily_id: null,
        date: null,
        time: null,
        sections: [
          {
            section_name: 'Urinalysis',
            data: [{ analyte: 'pH', result: '6.0', unit: '', reference: '5.0 - 8.0' }],
          },
        ],
      };

      const check = checkReport('GENERIC', report);

      expect(check.valid).toBe(true);
      if (check.valid) {
        expect(check.report.sections[0].data[0].out_of_range).toBe(false);
      }
    });
  });
});
