import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import UZip from 'uzip';

const main_ns = 'http://schemas.openxmlformats.org/spreadsheetml/2006/main';
const r_ns = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships';
const package_ns = 'http://schemas.openxmlformats.org/package/2006/relationships';
const declaration = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n';

export const default_styles = declaration 
  + `<styleSheet xmlns="${main_ns}">`
  + '<fonts count="1"><font><sz val="11"/><name val="Calibri"/></font></fonts>'
  + '<fills count="1"><fill><patternFill patternType="none"/></fill></fills>'
  + '<borders count="1"><border><left/><right/><top/><bottom/><diagonal/></border></borders>'
  + '<cellStyleXfs count="1"><xf numFmtId="0" fontId="0" fillId="0" borderId="0"/></cellStyleXfs>'
  + '<cellXfs count="1"><xf numFmtId="0" fontId="0" fillId="0" borderId="0" xfId="0"/></cellXfs>'
  + '</styleSheet>';

/** 
 * a small workbook: "Summary" (sheetId 1, sheet1.xml) and "Data" 
 * (sheetId 3, sheet2.xml) with a table named "Data" that has one 
 * calculated column.
 */
export const DefaultParts = (): Record<string, string> => ({

  '[Content_Types].xml': declaration 
    + '<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">'
    + '<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>'
    + '<Default Extension="xml" ContentType="application/xml"/>'
    + '<Override PartName="/xl/workbook.xml" ContentType="application/vnd.openxmlformats-officedocument.spreadsheetml.sheet.main+xml"/>'
    + '<Override PartName="/xl/worksheets/sheet1.xml" ContentType="application/vnd.openxmlformats-officedocument.spreadsheetml.worksheet+xml"/>'
    + '<Override PartName="/xl/worksheets/sheet2.xml" ContentType="application/vnd.openxmlformats-officedocument.spreadsheetml.worksheet+xml"/>'
    + '<Override PartName="/xl/tables/table1.xml" ContentType="application/vnd.openxmlformats-officedocument.spreadsheetml.table+xml"/>'
    + '<Override PartName="/xl/styles.xml" ContentType="application/vnd.openxmlformats-officedocument.spreadsheetml.styles+xml"/>'
    + '</Types>',

  '_rels/.rels': declaration 
    + `<Relationships xmlns="${package_ns}">`
    + '<Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" Target="xl/workbook.xml"/>'
    + '</Relationships>',

  'docProps/app.xml': declaration 
    + '<Properties xmlns="http://schemas.openxmlformats.org/officeDocument/2006/extended-properties">'
    + '<Application>Test</Application></Properties>',

  'xl/workbook.xml': declaration 
    + `<workbook xmlns="${main_ns}" xmlns:r="${r_ns}">`
    + '<bookViews><workbookView xWindow="0" yWindow="0" windowWidth="16000" windowHeight="9000"/></bookViews>'
    + '<sheets><sheet name="Summary" sheetId="1" r:id="rId1"/><sheet name="Data" sheetId="3" r:id="rId2"/></sheets>'
    + '<definedNames><definedName name="Total">Summary!$A$2</definedName></definedNames>'
    + '</workbook>',

  'xl/_rels/workbook.xml.rels': declaration 
    + `<Relationships xmlns="${package_ns}">`
    + '<Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/worksheet" Target="worksheets/sheet1.xml"/>'
    + '<Relationship Id="rId2" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/worksheet" Target="worksheets/sheet2.xml"/>'
    + '<Relationship Id="rId3" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/styles" Target="styles.xml"/>'
    + '</Relationships>',

  'xl/styles.xml': default_styles,

  'xl/worksheets/sheet1.xml': declaration 
    + `<worksheet xmlns="${main_ns}" xmlns:r="${r_ns}">`
    + '<dimension ref="A1:A2"/>'
    + '<sheetData><row r="1"><c r="A1" t="inlineStr"><is><t>Total</t></is></c></row>'
    + '<row r="2"><c r="A2"><f>SUM(Data!B:B)</f></c></row></sheetData>'
    + '</worksheet>',

  'xl/worksheets/sheet2.xml': declaration 
    + `<worksheet xmlns="${main_ns}" xmlns:r="${r_ns}">`
    + '<dimension ref="A1:C10"/>'
    + '<sheetViews><sheetView workbookViewId="0"/></sheetViews>'
    + '<sheetData><row r="1"><c r="A1" t="inlineStr"><is><t>old</t></is></c></row></sheetData>'
    + '<pageMargins left="0.7" right="0.7" top="0.75" bottom="0.75" header="0.3" footer="0.3"/>'
    + '<tableParts count="1"><tablePart r:id="rId1"/></tableParts>'
    + '</worksheet>',

  'xl/worksheets/_rels/sheet2.xml.rels': declaration 
    + `<Relationships xmlns="${package_ns}">`
    + '<Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/table" Target="../tables/table1.xml"/>'
    + '</Relationships>',

  'xl/tables/table1.xml': declaration 
    + `<table xmlns="${main_ns}" id="1" name="Table1" displayName="Data" ref="A1:C10" totalsRowShown="0">`
    + '<autoFilter ref="A1:C10"/>'
    + '<tableColumns count="3">'
    + '<tableColumn id="1" name="Name"/>'
    + '<tableColumn id="2" name="Amount"/>'
    + '<tableColumn id="3" name="Double"><calculatedColumnFormula>Data[[#This Row],[Amount]]*2</calculatedColumnFormula></tableColumn>'
    + '</tableColumns>'
    + '<tableStyleInfo name="TableStyleMedium2" showFirstColumn="0" showLastColumn="0" showRowStripes="1" showColumnStripes="0"/>'
    + '</table>',

});

/** 
 * default parts, with an element after definedNames in the workbook, 
 * where calcPr goes.
 */
export const ExtendedParts = (): Record<string, string> => {
  const parts = DefaultParts();
  parts['xl/workbook.xml'] = parts['xl/workbook.xml'].replace('</workbook>', 
    '<extLst><ext uri="{00000000-0000-0000-0000-000000000001}"/></extLst></workbook>');
  return parts;
};

export const EncodeParts = (parts: Record<string, string>): Uint8Array => {
  const encoder = new TextEncoder();
  const records: Record<string, Uint8Array> = {};
  for (const [key, value] of Object.entries(parts)) {
    records[key] = encoder.encode(value);
  }
  return new Uint8Array(UZip.encode(records));
};

export const ReadParts = (file: string): Record<string, string> => {

  const data = fs.readFileSync(file);
  const buffer = new ArrayBuffer(data.byteLength);
  new Uint8Array(buffer).set(data);

  const decoder = new TextDecoder();
  const parts: Record<string, string> = {};

  for (const [key, value] of Object.entries(UZip.parse(buffer))) {
    parts[key] = decoder.decode(value);
  }

  return parts;

};

/**
 * scratch directory for test files
 */
export class Fixture {

  public readonly dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tabfill-test-'));

  public Path(name: string): string {
    return path.join(this.dir, name);
  }

  public Write(name = 'template.xlsx', parts = DefaultParts()): string {
    const file = this.Path(name);
    fs.writeFileSync(file, EncodeParts(parts));
    return file;
  }

  public Cleanup(): void {
    fs.rmSync(this.dir, { recursive: true, force: true });
  }

}
