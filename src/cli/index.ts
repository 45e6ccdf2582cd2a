// src/cli/index.ts

import figlet from 'figlet';
import { rainbow } from 'gradient-string';
import { createProgram } from './program.ts';

if (process.stdout.isTTY) {
    console.log(rainbow.multiline(
        figlet.textSync('Folio Harvest', {
            font: 'Standard',
            horizontalLayout: 'default',
            verticalLayout: 'default',
            width: 80,
            whitespaceBreak: true,
        }),
    ));
    console.log(rainbow('Downloads manuscript pages from IIIF manifests and deep-zoom tile servers.\n'));
}

await createProgram().parseAsync(process.argv);
