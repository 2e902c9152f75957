import {createInterface} from 'node:readline/promises';
import {stdin as input, stdout as output} from 'node:process';

import {isFinished, PhaseType, rolesFor} from '@shared/mod.ts';

import {loadConfig} from './config.ts';
import {parseMove, renderBoard, statusText} from './render.ts';
import {SinglePlayerMatch} from './single-player.ts';

async function main(): Promise<void> {
    const config = loadConfig();
    const roles = rolesFor(config.cpu);
    const match = new SinglePlayerMatch(config, (move) => {
        console.log(`CPU plays ${move.row} ${move.col}`);
    });

    const rl = createInterface({input, output});

    const show = (): void => {
        const session = match.session();
        console.log(renderBoard(session.board()));
        console.log(statusText(session.phase(), roles));
    };

    match.begin();
    show();

    try {
        for (;;) {
            const line = (await rl.question('> ')).trim().toLowerCase();

            if (line === 'quit' || line === 'q') break;

            if (line === 'reset') {
                match.reset();
                match.begin();
                show();
                continue;
            }

            if (isFinished(match.session().phase())) {
                console.log("Type 'reset' to play again or 'quit' to leave.");
                continue;
            }

            const move = parseMove(line);
            if (!move) {
                console.log('Enter a move as "row col" (0-2).');
                continue;
            }

            match.play(move.row, move.col);
            show();

            const phase = match.session().phase();
            if (phase.type === PhaseType.Won || phase.type === PhaseType.Draw) {
                console.log(`Result: ${phase.type === PhaseType.Won ? `${phase.winner} won` : 'draw'}`);
            }
        }
    } finally {
        rl.close();
    }
}

main().catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
});
