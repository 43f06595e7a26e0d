import { describe, it, expect } from 'vitest';
import { findUnboundPlaceholders } from '../lint.js';
import { validateExtension } from '../validator.js';
import { callbookDocument, minimalDocument } from '../../__tests__/helpers.js';

function extensionOf(document: unknown) {
    const result = validateExtension(document);
    if (!result.ok) throw new Error('expected a valid document');
    return result.extension;
}

describe('findUnboundPlaceholders', () => {
    it('finds nothing when every placeholder has an input', () => {
        expect(findUnboundPlaceholders(extensionOf(callbookDocument()))).toEqual([]);
    });

    it('reports placeholders with no matching id or name', () => {
        const extension = extensionOf(minimalDocument('LINT', {
            io: {
                prompts: [{ prompt: 'Call', inputs: [{ id: 1, type: 'string', name: 'call' }] }],
                command: 'lookup {call} {1} {2} { band }',
            },
        }));

        expect(findUnboundPlaceholders(extension)).toEqual([
            { location: 'Run', token: '{2}' },
            { location: 'Run', token: '{ band }' },
        ]);
    });

    it('names the item trail through submenus', () => {
        const extension = extensionOf(minimalDocument('LINT', {
            text: 'Outer',
            io: undefined,
            menu: {
                prompt: 'Inner',
                items: [{ id: 1, text: 'Leaf', help: 'h', io: { command: 'echo {missing}' } }],
            },
        }));

        expect(findUnboundPlaceholders(extension)).toEqual([{ location: 'Outer > Leaf', token: '{missing}' }]);
    });
});
