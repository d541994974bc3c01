import { Response } from 'express';
import { AuthRequest } from '../middleware/auth';
import { requireUser } from '../middleware/role';
import { UserService } from '../service/user.service';
import { requestHandler } from '../utils/requestHandler';
import { sendResponse } from '../utils/response';
import { registerSchema, signInSchema } from '../validation/user.validation';

export class UserController {
  static register = requestHandler(async (req: AuthRequest, res: Response) => {
    const { username, password, email, fullName } = registerSchema.parse(req.body);
    // Staff status is granted out of band, never through registration.
    const newUser = await UserService.createUser({ username, password, email, fullName });
    sendResponse(res, 201, 'User created successfully', newUser);
  });

  static signIn = requestHandler(async (req: AuthRequest, res: Response) => {
    const { username, password } = signInSchema.parse(req.body);
    const result = await UserService.signIn(username, password);
    sendResponse(res, 200, 'Sign in successful', result);
  });

  static getProfile = requestHandler(async (req: AuthRequest, res: Response) => {
    const user = requireUser(req);
    const profile = await UserService.getUserById(user.id);
    sendResponse(res, 200, 'User profile retrieved successfully', profile);
  });
}
