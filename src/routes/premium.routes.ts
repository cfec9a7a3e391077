import { Router } from 'express';
import { body } from 'express-validator';
import { PremiumController } from '../controllers/premium.controller';
import { requireJsonContent, validate } from '../middleware/validate.middleware';

export const premiumRequestRules = [
  body('code')
    .isString().withMessage('Code must be a string')
    .bail()
    .trim()
    .matches(/^[A-Za-z0-9]{1,16}$/).withMessage('Code must be 1-16 letters or digits'),
  body('sumInsured')
    .isString().withMessage('Sum insured must be a string')
    .bail()
    .trim()
    .matches(/^\d+$/).withMessage('Sum insured must contain digits only'),
  body('dateOfBirth')
    .isString().withMessage('Date of birth must be a string')
    .bail()
    .trim()
    .matches(/^\d{4}-\d{2}-\d{2}$/).withMessage('Date of birth must be YYYY-MM-DD'),
];

export const createPremiumRoutes = (controller: PremiumController): Router => {
  const router = Router();

  router.post(
    '/',
    requireJsonContent,
    validate(premiumRequestRules),
    controller.calculate.bind(controller)
  );
  router.post('/loads', controller.load.bind(controller));
  router.post('/unloads', controller.unload.bind(controller));
  router.get('/checks', controller.check.bind(controller));

  return router;
};
