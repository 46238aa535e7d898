import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { generateFiles, generateSource, outputFileName } from '../src/codegen.js';
import { GenerationError, SchemaIoError, UnsupportedLanguageError } from '../src/errors.js';
import { createDefaultRegistry, registerLanguageHooks } from '../src/generator/index.js';
import { parseXsd, parseXsdFile } from '../src/xsd/parser.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const fixturesDir = resolve(__dirname, 'fixtures');

describe('generateSource — TypeScript', () => {
  it('renders purchase-order.xsd', async () => {
    const document = await parseXsdFile(resolve(fixturesDir, 'purchase-order.xsd'));
    const { source, failures } = generateSource(document, { lang: 'TypeScript' });

    expect(failures).toEqual([]);
    expect(source).toBe(
      [
        '// Code generated by xsd-typegen. DO NOT EDIT.',
        '',
        '// SKU ...',
        'export type SKU = string;',
        '',
        '// Status: Order lifecycle state.',
        "export type Status = 'open' | 'shipped';",
        '',
        '// Quantity ...',
        'export type Quantity = number;',
        '',
        '// SizeList ...',
        'export type SizeList = Array<number>;',
        '',
        '// Item ...',
        'export interface Item {',
        '  partNum: SKU;',
        '  productName: string;',
        '  quantity: number;',
        '  comment?: string;',
        '}',
        '',
        '// PurchaseOrderType ...',
        'export interface PurchaseOrderType {',
        '  status?: Status;',
        '  orderDate?: string;',
        '  item: Array<Item>;',
        '}',
        '',
        '// PurchaseOrder ...',
        'export type PurchaseOrder = PurchaseOrderType;',
        '',
      ].join('\n'),
    );
  });

  it('renders groups, unions and derivation', async () => {
    const document = await parseXsdFile(resolve(fixturesDir, 'xsd-prefix.xsd'));
    const { source } = generateSource(document, { lang: 'TypeScript' });

    expect(source).toContain(['export interface Audit {', '  createdBy?: string;', '}'].join('\n'));
    expect(source).toContain(['export interface Contact {', '  email: Array<string>;', '}'].join('\n'));
    expect(source).toContain('export type Code = number | string;');
    expect(source).toContain(
      ['export interface Party extends Contact, Audit {', '  person?: string;', '  company?: string;', '}'].join('\n'),
    );
    expect(source).toContain(['export interface Customer extends Party {', '  customerNo: Code;', '}'].join('\n'));
    expect(source).toContain(['export interface Price {', '  value: number;', '  currency: string;', '}'].join('\n'));
  });

  it('gives anonymous types readable identifiers and skips self-typed elements', async () => {
    const document = await parseXsdFile(resolve(fixturesDir, 'default-namespace.xsd'));
    const { source } = generateSource(document, { lang: 'TypeScript' });

    expect(source).toBe(
      [
        '// Code generated by xsd-typegen. DO NOT EDIT.',
        '',
        '// NotePriority ...',
        "export type NotePriority = 'low' | 'high';",
        '',
        '// Note ...',
        'export interface Note {',
        '  id: string;',
        '  to: string;',
        '  priority: NotePriority;',
        '}',
        '',
      ].join('\n'),
    );
  });

  it('disambiguates colliding identifiers with a counter', async () => {
    const document = await parseXsdFile(resolve(fixturesDir, 'with-include.xsd'));
    const { source } = generateSource(document, { lang: 'TypeScript' });

    expect(source).toBe(
      [
        '// Code generated by xsd-typegen. DO NOT EDIT.',
        '',
        '// Label2 ...',
        'export type Label2 = Label;',
        '',
        '// Label ...',
        'export type Label = string;',
        '',
      ].join('\n'),
    );
  });

  it('quotes property names that are not identifiers and disambiguates repeats', () => {
    const document = parseXsd(`
      <xs:schema xmlns:xs="http://www.w3.org/2001/XMLSchema">
        <xs:complexType name="Entry">
          <xs:sequence>
            <xs:element name="id" type="xs:int"/>
            <xs:element name="last-name" type="xs:string"/>
          </xs:sequence>
          <xs:attribute name="id" type="xs:string"/>
        </xs:complexType>
      </xs:schema>`);
    const { source } = generateSource(document, { lang: 'TypeScript' });

    expect(source).toContain(
      ['export interface Entry {', '  id?: string;', '  id2: number;', "  'last-name': string;", '}'].join('\n'),
    );
  });

  it('keeps member names distinct when a field is already named like a suffixed one', () => {
    const document = parseXsd(`
      <xs:schema xmlns:xs="http://www.w3.org/2001/XMLSchema">
        <xs:complexType name="Entry">
          <xs:sequence>
            <xs:element name="id" type="xs:int"/>
            <xs:element name="id2" type="xs:string"/>
          </xs:sequence>
          <xs:attribute name="id" type="xs:string"/>
        </xs:complexType>
      </xs:schema>`);

    expect(generateSource(document, { lang: 'TypeScript' }).source).toContain(
      ['export interface Entry {', '  id?: string;', '  id2: number;', '  id22: string;', '}'].join('\n'),
    );
    expect(generateSource(document, { lang: 'Go' }).source).toContain(
      [
        'type Entry struct {',
        '\tId *string `xml:"id,attr,omitempty"`',
        '\tId2 int `xml:"id"`',
        '\tId22 string `xml:"id2"`',
        '}',
      ].join('\n'),
    );
  });

  it('produces identical output on repeated runs', async () => {
    const document = await parseXsdFile(resolve(fixturesDir, 'xsd-prefix.xsd'));
    const first = generateSource(document, { lang: 'TypeScript' }).source;
    const second = generateSource(document, { lang: 'TypeScript' }).source;
    expect(second).toBe(first);
  });
});

describe('generateSource — Go', () => {
  it('renders purchase-order.xsd', async () => {
    const document = await parseXsdFile(resolve(fixturesDir, 'purchase-order.xsd'));
    const { source } = generateSource(document, { lang: 'Go', packageName: 'po' });

    expect(source).toBe(
      [
        '// Code generated by xsd-typegen. DO NOT EDIT.',
        '',
        'package po',
        '',
        '// SKU ...',
        'type SKU string',
        '',
        '// Status: Order lifecycle state.',
        'type Status string',
        '',
        'const (',
        '\tStatusOpen Status = "open"',
        '\tStatusShipped Status = "shipped"',
        ')',
        '',
        '// Quantity ...',
        'type Quantity int',
        '',
        '// SizeList ...',
        'type SizeList []float64',
        '',
        '// Item ...',
        'type Item struct {',
        '\tPartNum SKU `xml:"partNum,attr"`',
        '\tProductName string `xml:"productName"`',
        '\tQuantity int `xml:"quantity"`',
        '\tComment *string `xml:"comment,omitempty"`',
        '}',
        '',
        '// PurchaseOrderType ...',
        'type PurchaseOrderType struct {',
        '\tStatus *Status `xml:"status,attr,omitempty"`',
        '\tOrderDate *string `xml:"orderDate,attr,omitempty"`',
        '\tItem []Item `xml:"item"`',
        '}',
        '',
        '// PurchaseOrder ...',
        'type PurchaseOrder PurchaseOrderType',
        '',
      ].join('\n'),
    );
  });

  it('imports the packages that built-in spellings need', () => {
    const document = parseXsd(`
      <xs:schema xmlns:xs="http://www.w3.org/2001/XMLSchema">
        <xs:element name="startsAt" type="xs:time"/>
        <xs:attribute name="ref" type="xs:QName"/>
      </xs:schema>`);
    const { source } = generateSource(document, { lang: 'Go' });

    expect(source).toBe(
      [
        '// Code generated by xsd-typegen. DO NOT EDIT.',
        '',
        'package schema',
        '',
        'import (',
        '\t"encoding/xml"',
        '\t"time"',
        ')',
        '',
        '// StartsAt ...',
        'type StartsAt time.Time',
        '',
        '// Ref ...',
        'type Ref xml.Name',
        '',
      ].join('\n'),
    );
  });

  it('embeds base types and groups', async () => {
    const document = await parseXsdFile(resolve(fixturesDir, 'xsd-prefix.xsd'));
    const { source } = generateSource(document, { lang: 'Go' });

    expect(source).toContain('type Code string');
    expect(source).toContain(
      [
        'type Party struct {',
        '\tContact',
        '\tAudit',
        '\tPerson *string `xml:"person,omitempty"`',
        '\tCompany *string `xml:"company,omitempty"`',
        '}',
      ].join('\n'),
    );
    expect(source).toContain(['type Customer struct {', '\tParty', '\tCustomerNo Code `xml:"customerNo"`', '}'].join('\n'));
    expect(source).toContain(
      ['type Price struct {', '\tValue float64 `xml:",chardata"`', '\tCurrency string `xml:"currency,attr"`', '}'].join(
        '\n',
      ),
    );
  });
});

describe('generateSource — Rust', () => {
  it('renders enums and serde structs', async () => {
    const document = await parseXsdFile(resolve(fixturesDir, 'purchase-order.xsd'));
    const { source } = generateSource(document, { lang: 'Rust' });

    expect(source).toContain(
      [
        '// Status: Order lifecycle state.',
        '#[derive(Debug, Clone, PartialEq, Serialize, Deserialize)]',
        'pub enum Status {',
        '    #[serde(rename = "open")]',
        '    Open,',
        '    #[serde(rename = "shipped")]',
        '    Shipped,',
        '}',
      ].join('\n'),
    );
    expect(source).toContain(
      [
        'pub struct Item {',
        '    #[serde(rename = "@partNum")]',
        '    pub part_num: SKU,',
        '    #[serde(rename = "productName")]',
        '    pub product_name: String,',
        '    #[serde(rename = "quantity")]',
        '    pub quantity: u32,',
        '    #[serde(rename = "comment")]',
        '    pub comment: Option<String>,',
        '}',
      ].join('\n'),
    );
    expect(source).toContain('pub type SizeList = Vec<f64>;');
    expect(source.startsWith('// Code generated by xsd-typegen. DO NOT EDIT.\n\nuse serde::{Deserialize, Serialize};\n\n')).toBe(
      true,
    );
  });

  it('flattens groups and escapes keyword field names', async () => {
    const document = parseXsd(`
      <xs:schema xmlns:xs="http://www.w3.org/2001/XMLSchema">
        <xs:group name="Contact"><xs:sequence><xs:element name="email" type="xs:string"/></xs:sequence></xs:group>
        <xs:complexType name="Party">
          <xs:sequence><xs:group ref="Contact"/></xs:sequence>
          <xs:attribute name="type" type="xs:string" use="required"/>
        </xs:complexType>
      </xs:schema>`);
    const { source } = generateSource(document, { lang: 'Rust' });

    expect(source).toContain(
      [
        'pub struct Party {',
        '    #[serde(flatten)]',
        '    pub contact: Contact,',
        '    #[serde(rename = "@type")]',
        '    pub type_: String,',
        '}',
      ].join('\n'),
    );
  });
});

describe('generateSource — mixed content and fixed attributes', () => {
  const document = parseXsd(`
    <xs:schema xmlns:xs="http://www.w3.org/2001/XMLSchema">
      <xs:complexType name="Note" mixed="true">
        <xs:sequence>
          <xs:element name="b" type="xs:string" minOccurs="0"/>
        </xs:sequence>
        <xs:attribute name="version" type="xs:string" fixed="1.0"/>
      </xs:complexType>
    </xs:schema>`);

  it('renders a text member and a literal type in TypeScript', () => {
    expect(generateSource(document, { lang: 'TypeScript' }).source).toContain(
      ['export interface Note {', '  value?: string;', "  version?: '1.0';", '  b?: string;', '}'].join('\n'),
    );
  });

  it('renders a chardata field and notes the fixed value in Go', () => {
    expect(generateSource(document, { lang: 'Go' }).source).toContain(
      [
        'type Note struct {',
        '\tValue string `xml:",chardata"`',
        '\tVersion *string `xml:"version,attr,omitempty"` // fixed: "1.0"',
        '\tB *string `xml:"b,omitempty"`',
        '}',
      ].join('\n'),
    );
  });

  it('renders an optional $value field in Rust', () => {
    expect(generateSource(document, { lang: 'Rust' }).source).toContain(
      [
        'pub struct Note {',
        '    #[serde(rename = "$value")]',
        '    pub value: Option<String>,',
        '    #[serde(rename = "@version")]',
        '    pub version: Option<String>, // fixed: "1.0"',
        '    #[serde(rename = "b")]',
        '    pub b: Option<String>,',
        '}',
      ].join('\n'),
    );
  });
});

describe('generateSource — dispatch', () => {
  const document = parseXsd(`
    <xs:schema xmlns:xs="http://www.w3.org/2001/XMLSchema">
      <xs:element name="first" type="xs:string"/>
      <xs:element name="second" type="xs:string"/>
      <xs:element name="third" type="xs:string"/>
    </xs:schema>`);

  it('emits only the header for a language without hooks', () => {
    expect(generateSource(document, { lang: 'C' }).source).toBe('// Code generated by xsd-typegen. DO NOT EDIT.\n');
    expect(generateSource(document, { lang: 'Java', packageName: 'com.example' }).source).toBe(
      '// Code generated by xsd-typegen. DO NOT EDIT.\n\npackage com.example;\n',
    );
  });

  it('dispatches to hooks registered for a new language', () => {
    const registry = registerLanguageHooks(createDefaultRegistry(), 'Java', {
      Element(context, node) {
        const id = context.declare(node);
        if (id) context.emit(`public class ${id} { public ${context.spell(node.type)} value; }`);
      },
    });
    const { source } = generateSource(document, { lang: 'Java', registry });

    expect(source).toBe(
      [
        '// Code generated by xsd-typegen. DO NOT EDIT.',
        '',
        'package schema;',
        '',
        'public class First { public String value; }',
        '',
        'public class Second { public String value; }',
        '',
        'public class Third { public String value; }',
        '',
      ].join('\n'),
    );
  });

  it('throws GenerationError on the first hook failure', () => {
    const registry = registerLanguageHooks(createDefaultRegistry(), 'C', {
      Element: (_context, node) => (node.name === 'third' ? undefined : new Error(`no C type for ${node.name}`)),
    });

    let caught: unknown;
    try {
      generateSource(document, { lang: 'C', registry });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(GenerationError);
    if (!(caught instanceof GenerationError)) return;
    expect(caught.failures).toHaveLength(1);
    expect(caught.failures[0]).toMatchObject({ hook: 'CElement', node: 'first' });
    expect(caught.message).toBe('Code generation failed with 1 error(s):\n  [CElement first] no C type for first');
  });

  it('collects every failure when continuing past errors', () => {
    const registry = registerLanguageHooks(createDefaultRegistry(), 'C', {
      Element(context, node) {
        if (node.name !== 'third') return new Error(`no C type for ${node.name}`);
        context.emit(`typedef ${context.spell(node.type)} third;`);
        return undefined;
      },
    });
    const result = generateSource(document, { lang: 'C', registry, continueOnError: true });

    expect(result.failures.map((f) => f.node)).toEqual(['first', 'second']);
    expect(result.source).toBe('// Code generated by xsd-typegen. DO NOT EDIT.\n\ntypedef char third;\n');
  });

  it('rejects an unsupported language before rendering', () => {
    expect(() => generateSource(document, { lang: 'Kotlin' })).toThrow(UnsupportedLanguageError);
  });
});

describe('outputFileName', () => {
  it('snake-cases the schema base name and appends the extension', () => {
    expect(outputFileName('/schemas/PurchaseOrder.xsd', 'Go')).toBe('purchase_order.go');
    expect(outputFileName('https://example.com/xsd/address-book.xsd', 'Rust')).toBe('address_book.rs');
    expect(outputFileName('https://example.com/', 'TypeScript')).toBe('example.ts');
  });
});

describe('generateFiles', () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = join(await mkdtemp(join(tmpdir(), 'xsd-typegen-')), 'out', 'nested');
  });

  afterEach(async () => {
    await rm(dirname(dirname(outputDir)), { recursive: true, force: true });
  });

  it('generates one file per schema, mirroring the directory tree', async () => {
    const files = await generateFiles(resolve(fixturesDir, 'batch'), { lang: 'Go', outputDir });

    expect(files.map((f) => f.path)).toEqual([
      join(outputDir, 'order_types.go'),
      join(outputDir, 'shared', 'address_book.go'),
    ]);
    expect(await readFile(join(outputDir, 'shared', 'address_book.go'), 'utf-8')).toBe(files[1].source);
    const written = await readFile(join(outputDir, 'order_types.go'), 'utf-8');
    expect(written).toBe(
      [
        '// Code generated by xsd-typegen. DO NOT EDIT.',
        '',
        'package schema',
        '',
        '// OrderId ...',
        'type OrderId uint32',
        '',
      ].join('\n'),
    );
    expect(files[1].source).toContain('type Street string');
  });

  it('rejects two schemas that map to the same output file', async () => {
    const dir = resolve(fixturesDir, 'collide');
    const outcome = generateFiles(dir, { lang: 'Go', outputDir });

    await expect(outcome).rejects.toBeInstanceOf(SchemaIoError);
    await expect(generateFiles(dir, { lang: 'Go' })).rejects.toThrow(
      `Schemas ${join(dir, 'OrderTypes.xsd')} and ${join(dir, 'order-types.xsd')} map to the same output file: order_types.go`,
    );
  });

  it('keeps subdirectories in the paths it returns without writing', async () => {
    const files = await generateFiles(resolve(fixturesDir, 'batch'), { lang: 'Rust' });
    expect(files.map((f) => f.path)).toEqual(['order_types.rs', join('shared', 'address_book.rs')]);
  });

  it('returns sources without writing when no output directory is given', async () => {
    const files = await generateFiles(resolve(fixturesDir, 'batch', 'OrderTypes.xsd'), { lang: 'TypeScript' });

    expect(files).toHaveLength(1);
    expect(files[0].path).toBe('order_types.ts');
    expect(files[0].source).toContain('export type OrderId = number;');
  });
});
