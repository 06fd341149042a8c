import { describe, it, expect } from 'vitest';
import { formatForWhatsApp } from './formatter.js';

describe('formatForWhatsApp', () => {
  it('turns double-asterisk bold into WhatsApp bold', () => {
    expect(formatForWhatsApp('Usa **Configuración** y luego **Guardar**')).toBe('Usa *Configuración* y luego *Guardar*');
  });

  it('flattens Markdown links', () => {
    expect(formatForWhatsApp('Ver [la guía](https://example.com/guia).')).toBe('Ver la guía: https://example.com/guia.');
  });

  it('drops citation markers and surrounding whitespace', () => {
    expect(formatForWhatsApp('  Abrimos a las 9【4:0†source】 ')).toBe('Abrimos a las 9');
  });

  it('removes control characters but keeps line breaks and tabs', () => {
    expect(formatForWhatsApp('uno\u0007\ndos\tdos\u001B')).toBe('uno\ndos\tdos');
  });

  it('returns an empty string for empty input', () => {
    expect(formatForWhatsApp('')).toBe('');
  });
});
