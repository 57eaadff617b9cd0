import express, { Express } from 'express';
import bodyParser from 'body-parser';
import * as path from 'path';
import { FixKind } from '../application/fix_operations';
import { FixController } from './fix_controller';

// Resolved against the working directory.
export const PUBLIC_DIR = path.resolve('public');

const FIX_KINDS: FixKind[] = ['enp', 'nprn', 'disp'];

export function createFixApp(controller: FixController, publicDir: string = PUBLIC_DIR): Express {
    const app = express();

    app.use(bodyParser.json());
    app.use('/static', express.static(publicDir));

    app.get('/', (_req, res) => {
        res.sendFile(path.join(publicDir, 'index.html'));
    });

    for (const kind of FIX_KINDS) {
        app.post(`/fix/${kind}`, async (req, res) => {
            console.log(`📨 [Fix Server] /fix/${kind}`);
            const response = await controller.handle(kind, req.get('x-api-token'), req.body);
            res.status(response.status).json(response.body);
        });
    }

    return app;
}
