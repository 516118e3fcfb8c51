import { Router, Application } from 'express';
import { OptionChainController } from '../controllers/optionChainController';
import { OptionChainService } from '../services/optionChainService';
import { Transport } from '../api/chains/types';

export const setOptionChainRoutes = (app: Application, transport: Transport) => {
    const router = Router();
    const optionChainController = new OptionChainController(new OptionChainService(transport));

    router.get('/option-chain/:symbol', optionChainController.getOptionChain.bind(optionChainController));
    router.get('/health', (_req, res) => {
        res.status(200).json({ status: 'ok' });
    });
    app.use('/', router);
};
