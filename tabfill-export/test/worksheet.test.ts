import { WorksheetWriter } from '../src/worksheet';

const prefix = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>'
  + '<worksheet xmlns="http://schemas.openxmlformats.org/spreadsheetml/2006/main"'
  + ' xmlns:r="http://schemas.openxmlformats.org/officeDocument/2006/relationships">';

const suffix = '</worksheet>';

const InlineString = (text: string) => `<c t="inlineStr"><is><t>${text}</t></is></c>`;

test('empty', () => {
  const writer = new WorksheetWriter();
  expect(writer.ToXML()).toEqual(prefix + '<sheetData/>' + suffix);
  expect(writer.RowCount).toEqual(0);
});

test('strings', () => {

  const writer = new WorksheetWriter().AddRow(['a', 'b', 'c']);

  expect(writer.ToXML()).toEqual(prefix 
    + '<sheetData><row r="1">' + InlineString('a') + InlineString('b') + InlineString('c') + '</row></sheetData>' 
    + suffix);

});

test('escaping', () => {

  const writer = new WorksheetWriter().AddRow([`Tom & Jerry's <b>"x"</b>`]);

  expect(writer.ToXML()).toEqual(prefix 
    + '<sheetData><row r="1">' + InlineString('Tom &amp; Jerry&apos;s &lt;b&gt;&quot;x&quot;&lt;/b&gt;') + '</row></sheetData>' 
    + suffix);

});

test('cell types', () => {

  const writer = new WorksheetWriter();

  writer.AddRow([
    42, 
    -0.5, 
    new Date(2013, 3, 5), 
    { type: 'formula', value: 'IF(A1<2,"x","y")' },
    null,
    NaN,
  ]);

  expect(writer.ToXML()).toEqual(prefix 
    + '<sheetData><row r="1">'
    + '<c><v>42</v></c>'
    + '<c><v>-0.5</v></c>'
    + '<c s="1"><v>41369</v></c>'
    + '<c><f>IF(A1&lt;2,&quot;x&quot;,&quot;y&quot;)</f></c>'
    + InlineString('')
    + InlineString('NaN')
    + '</row></sheetData>' 
    + suffix);

});

test('date style', () => {

  const writer = new WorksheetWriter().AddRow([new Date(2013, 3, 5, 12)]);
  expect(writer.ToXML()).toContain('<c s="1"><v>41369.5</v></c>');

  writer.SetDateTimeStyle(4);
  expect(writer.ToXML()).toContain('<c s="4"><v>41369.5</v></c>');

});

test('rows', () => {

  const writer = new WorksheetWriter().AddRows([[1], [2], [3]]);

  expect(writer.RowCount).toEqual(3);
  expect(writer.ToXML()).toEqual(prefix 
    + '<sheetData>'
    + '<row r="1"><c><v>1</v></c></row>'
    + '<row r="2"><c><v>2</v></c></row>'
    + '<row r="3"><c><v>3</v></c></row>'
    + '</sheetData>' 
    + suffix);

});

test('cache', () => {

  const writer = new WorksheetWriter().AddRow([1]);
  const first = writer.ToXML();

  expect(writer.ToXML()).toEqual(first);

  writer.AddRow([2]);
  expect(writer.ToXML()).not.toEqual(first);
  expect(writer.ToXML()).toContain('<row r="2"><c><v>2</v></c></row>');

});

test('calculated columns', () => {

  const writer = new WorksheetWriter().AddRows([
    ['Name', 'Amount'],
    ['a', 1],
  ], [
    { index: 2, header: 'Double', formula: 'Data[[#This Row],[Amount]]*2' },
  ]);

  expect(writer.ToXML()).toEqual(prefix 
    + '<sheetData>'
    + '<row r="1">' + InlineString('Name') + InlineString('Amount') + InlineString('Double') + '</row>'
    + '<row r="2">' + InlineString('a') + '<c><v>1</v></c><c><f>Data[[#This Row],[Amount]]*2</f></c></row>'
    + '</sheetData>' 
    + suffix);

});

test('calculated column in the middle', () => {

  const writer = new WorksheetWriter().AddRows([
    ['A', 'C'],
    [1, 3],
  ], [
    { index: 1, header: 'B', formula: 'x' },
  ]);

  expect(writer.ToXML()).toContain('<row r="2"><c><v>1</v></c><c><f>x</f></c><c><v>3</v></c></row>');

});
