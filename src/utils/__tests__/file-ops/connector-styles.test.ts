import { StyleRegistry, connectorStyler, normalizeIndent, visualWidth } from '@file-ops/connector-styles';
import { TreeError } from '@file-ops/errors';

import { captureError } from '../../../__tests__/test-helpers';

describe('connector styles', () => {
  describe('built-in styles', () => {
    const registry = new StyleRegistry();

    it('derives the classic style from the default indent', () => {
      expect(registry.resolve('classic')).toEqual({
        branch: '├── ',
        end: '└── ',
        vertical: '│   ',
        space: '    ',
      });
    });

    it('ships dash, arrow and plus', () => {
      expect(registry.resolve('dash')).toEqual({ branch: '|-- ', end: '`-- ', vertical: '|   ', space: '    ' });
      expect(registry.resolve('arrow')).toEqual({ branch: '├─> ', end: '└─> ', vertical: '│   ', space: '    ' });
      expect(registry.resolve('plus')).toEqual({ branch: '+-- ', end: '\\-- ', vertical: '|   ', space: '    ' });
    });

    it('keeps every fragment of every built-in at the same width', () => {
      for (const indent of [1, 2, 5]) {
        const widths = new StyleRegistry(indent)
          .names()
          .map((name) => new StyleRegistry(indent).resolve(name))
          .flatMap((spec) => [spec.branch, spec.end, spec.vertical, spec.space].map(visualWidth));
        expect(new Set(widths)).toEqual(new Set([indent + 2]));
      }
    });

    it('widens connectors with the indent', () => {
      const wide = new StyleRegistry(3).resolve('classic');
      expect(wide.branch).toBe('├─── ');
      expect(wide.end).toBe('└─── ');
      expect(wide.vertical).toBe('│    ');
      expect(wide.space).toBe('     ');
    });

    it('returns frozen specs', () => {
      expect(Object.isFrozen(registry.resolve('classic'))).toBe(true);
    });
  });

  describe('connectorStyler', () => {
    it('uses branch and end verbatim and pads to the wider one', () => {
      expect(connectorStyler('+- ', '\\-- ', '|')).toEqual({
        branch: '+- ',
        end: '\\-- ',
        vertical: '|   ',
        space: '    ',
      });
    });

    it('handles multi-byte connectors by code point', () => {
      const spec = connectorStyler('→* ', '↳* ');
      expect(spec.space).toBe('   ');
      expect(spec.vertical).toBe('│  ');
    });
  });

  describe('registry', () => {
    it('registers and resolves user styles', () => {
      const registry = new StyleRegistry();
      const spec = registry.register('arrowstar', '→* ', '↳* ');
      expect(registry.resolve('arrowstar')).toBe(spec);
      expect(registry.has('arrowstar')).toBe(true);
      expect(registry.names()).toEqual(['classic', 'dash', 'arrow', 'plus', 'arrowstar']);
    });

    it('lets a user style replace a built-in', () => {
      const registry = new StyleRegistry();
      registry.register('plus', '+-- ', '+== ');
      expect(registry.resolve('plus').end).toBe('+== ');
    });

    it('rejects unknown names with UNKNOWN_STYLE', () => {
      const registry = new StyleRegistry();
      const error = captureError(() => registry.resolve('invalid-style'));
      expect(error).toBeInstanceOf(TreeError);
      expect(error).toMatchObject({ code: 'UNKNOWN_STYLE' });
    });

    it('re-derives built-ins but keeps registered styles when the indent changes', () => {
      const registry = new StyleRegistry();
      registry.register('plus', '+-- ', '+== ');
      registry.register('mine', '>> ', '>> ');

      const wider = registry.withIndent(4);
      expect(wider.indent).toBe(4);
      expect(wider.resolve('classic').branch).toBe('├──── ');
      expect(wider.resolve('plus').end).toBe('+== ');
      expect(wider.resolve('mine').branch).toBe('>> ');
    });
  });

  describe('normalizeIndent', () => {
    it('clamps to the supported range', () => {
      expect(normalizeIndent(0)).toBe(1);
      expect(normalizeIndent(100)).toBe(16);
      expect(normalizeIndent(3.7)).toBe(3);
      expect(normalizeIndent(Number.NaN)).toBe(2);
    });
  });
});
