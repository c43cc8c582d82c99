import { Faker, allLocales, en } from '@faker-js/faker';
import { stripQuotes } from '@courier/catalog';

export type GeneratorArg = string | number;
export type GeneratedValue = string | number | boolean;

/** Produces one fake value per call. Implementations may be nondeterministic. */
export interface FakeDataGenerator {
  invoke(method: string, args: GeneratorArg[]): GeneratedValue;
  supports(method: string): boolean;
}

export interface GeneratorCall {
  method: string;
  args: GeneratorArg[];
}

const CALL_RE = /^fake\.([A-Za-z_]\w*)\s*(?:\((.*)\))?$/s;

/** Parse `fake.method(arg, ...)`; parentheses are optional. */
export function parseGeneratorCall(content: string): GeneratorCall | null {
  const match = content.trim().match(CALL_RE);
  if (!match) return null;

  const rawArgs = match[2]?.trim() ?? '';
  const args = rawArgs === ''
    ? []
    : rawArgs.split(',').map((arg): GeneratorArg => {
        const text = stripQuotes(arg);
        return /^-?\d+(\.\d+)?$/.test(text) ? Number(text) : text;
      });

  return { method: match[1], args };
}

// ── Faker-backed generator ───────────────────────────────────────────

type FakerMethod = (faker: Faker, args: GeneratorArg[]) => GeneratedValue;

function intArg(args: GeneratorArg[], index: number, fallback: number): number {
  const value = args[index];
  if (value === undefined) return fallback;
  const n = typeof value === 'number' ? value : Number(value);
  if (!Number.isInteger(n)) {
    throw new Error(`argument ${index + 1} must be an integer, got "${value}"`);
  }
  return n;
}

// Largest digit count whose values stay exact as a JS number
const SAFE_DIGITS = 15;

const METHODS: Record<string, FakerMethod> = {
  // people
  name: (f) => f.person.fullName(),
  first_name: (f) => f.person.firstName(),
  last_name: (f) => f.person.lastName(),
  job: (f) => f.person.jobTitle(),
  user_name: (f) => f.internet.userName(),
  email: (f) => f.internet.email(),
  password: (f, args) => f.internet.password({ length: intArg(args, 0, 12) }),
  phone_number: (f) => f.phone.number(),
  company: (f) => f.company.name(),

  // places
  address: (f) => `${f.location.streetAddress()}, ${f.location.city()}, ${f.location.state({ abbreviated: true })} ${f.location.zipCode()}`,
  street_address: (f) => f.location.streetAddress(),
  city: (f) => f.location.city(),
  state: (f) => f.location.state(),
  zipcode: (f) => f.location.zipCode(),
  country: (f) => f.location.country(),

  // web
  url: (f) => f.internet.url(),
  image_url: (f) => f.image.url(),
  uuid4: (f) => f.string.uuid(),

  // text
  text: (f, args) => {
    const max = intArg(args, 0, 200);
    const text = f.lorem.paragraphs(Math.max(1, Math.ceil(max / 200)), ' ');
    return text.length > max ? text.slice(0, max).trimEnd() : text;
  },
  sentence: (f) => f.lorem.sentence(),
  word: (f) => f.lorem.word(),
  color: (f) => f.color.human(),

  // dates
  iso8601: (f) => f.date.anytime().toISOString(),
  date: (f) => f.date.anytime().toISOString().slice(0, 10),

  // numbers and flags
  boolean: (f) => f.datatype.boolean(),
  random_int: (f, args) => f.number.int({ min: intArg(args, 0, 0), max: intArg(args, 1, 9999) }),
  random_number: (f, args) => {
    const digits = intArg(args, 0, 10);
    if (digits < 1) throw new Error('digit count must be at least 1');
    const text = f.string.numeric({ length: digits, allowLeadingZeros: false });
    return digits <= SAFE_DIGITS ? Number(text) : text;
  },
  random_string: (f, args) => f.string.alpha({ length: intArg(args, 0, 10) }),
};

export interface FakerGeneratorOptions {
  /** Seed for reproducible output */
  seed?: number;
  /** Faker locale id such as `de` or `en_US`; falls back to English */
  locale?: string;
}

export class FakerGenerator implements FakeDataGenerator {
  private readonly faker: Faker;

  constructor(options: FakerGeneratorOptions = {}) {
    const localeDefinition = options.locale ? lookupLocale(options.locale) : undefined;
    this.faker = new Faker({ locale: localeDefinition ? [localeDefinition, en] : [en] });
    if (options.seed !== undefined) this.faker.seed(options.seed);
  }

  supports(method: string): boolean {
    return Object.hasOwn(METHODS, method);
  }

  invoke(method: string, args: GeneratorArg[]): GeneratedValue {
    if (!this.supports(method)) {
      throw new Error(`unknown fake-data method "${method}"`);
    }
    return METHODS[method](this.faker, args);
  }

  /** The underlying faker instance, handed to scripts. */
  get instance(): Faker {
    return this.faker;
  }
}

function lookupLocale(locale: string) {
  const entry = Object.entries(allLocales).find(([id]) => id === locale);
  if (!entry) {
    console.warn(`FakerGenerator: unknown locale "${locale}", using en`);
    return undefined;
  }
  return entry[1];
}
