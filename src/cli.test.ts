import { describe, expect, it } from 'vitest';
import { DEFAULT_CRITERIA, DEFAULT_LISTINGS, USAGE, parseCliArgs, runCli } from './cli';
import { RESULT_SEPARATOR } from './lib/utils/format-result';

function capture() {
  const printed: string[] = [];
  return { printed, print: (text: string) => printed.push(text) };
}

describe('parseCliArgs', () => {
  it('uses the bundled inventory and criteria by default', () => {
    expect(parseCliArgs([])).toEqual({
      listings: DEFAULT_LISTINGS,
      criteria: DEFAULT_CRITERIA,
      top: undefined,
    });
  });

  it('reads short and long options', () => {
    expect(parseCliArgs(['-l', 'inventario.json', '--criteria', 'criterios.json', '-t', '3'])).toEqual({
      listings: 'inventario.json',
      criteria: 'criterios.json',
      top: 3,
    });
  });

  it('rejects a top that is not a positive integer', () => {
    expect(() => parseCliArgs(['--top', '0'])).toThrow('--top debe ser un entero positivo (recibido "0")');
    expect(() => parseCliArgs(['--top', 'cinco'])).toThrow(/entero positivo/);
  });

  it('rejects unknown options', () => {
    expect(() => parseCliArgs(['--verbose'])).toThrow();
  });
});

describe('runCli', () => {
  it('prints the ranked shortlist for the bundled sample', async () => {
    const { printed, print } = capture();

    const code = await runCli([], print);

    expect(code).toBe(0);
    expect(printed).toHaveLength(1);
    const lines = printed[0].split('\n');
    expect(lines[0]).toBe('Terrenos sugeridos:');
    expect(lines[2]).toBe('T-001 - Parcela industrial Ruta 5 (Metropolitana de Santiago, San Bernardo)');
    expect(lines[3]).toBe('  Score: 0.949');
    expect(lines.filter((line) => line.startsWith('T-'))).toEqual([
      'T-001 - Parcela industrial Ruta 5 (Metropolitana de Santiago, San Bernardo)',
      'T-002 - Lote logístico Lampa (Metropolitana de Santiago, Lampa)',
      'T-004 - Sitio portuario San Antonio (Valparaíso, San Antonio)',
    ]);
    expect(lines.filter((line) => line === RESULT_SEPARATOR)).toHaveLength(3);
  });

  it('limits the shortlist with --top', async () => {
    const { printed, print } = capture();

    await runCli(['--top', '1'], print);

    expect(printed[0].split('\n').filter((line) => line === RESULT_SEPARATOR)).toHaveLength(1);
  });

  it('prints usage and exits with 2 on bad arguments', async () => {
    const { printed, print } = capture();

    expect(await runCli(['--top', '-1'], print)).toBe(2);
    expect(printed).toEqual([USAGE]);
  });

  it('exits with 1 when the inventory cannot be loaded', async () => {
    const { printed, print } = capture();

    expect(await runCli(['--listings', 'data/no-existe.json'], print)).toBe(1);
    expect(printed).toEqual([]);
  });
});
