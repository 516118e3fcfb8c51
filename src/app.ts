import express from 'express';
import cors from 'cors';
import morgan from 'morgan';
import { setOptionChainRoutes } from './routes/optionChain';
import { Transport } from './api/chains/types';
import { morganStream } from './utils/logger';

export const createApp = (transport: Transport) => {
    const app = express();

    app.use(cors());
    app.use(express.json());
    app.use(morgan('combined', { stream: morganStream }));

    setOptionChainRoutes(app, transport);
    return app;
};
