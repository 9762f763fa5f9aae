import { Router } from 'express';
import multer from 'multer';
import { ResumeController } from './resume.controller';
import type { ResumeService } from './resume.service';

const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: 10 * 1024 * 1024 // 10MB limit
  }
});

export function resumeRoutes(service: ResumeService): Router {
  const router = Router();
  const controller = new ResumeController(service);

  // POST /api/resume - Upload and analyze a resume (PDF, DOCX or TXT)
  router.post('/resume', upload.single('resumeFile'), controller.uploadResume.bind(controller));

  // GET /api/profile - Current candidate profile
  router.get('/profile', controller.getProfile.bind(controller));

  // PUT /api/profile - Replace the candidate profile
  router.put('/profile', controller.putProfile.bind(controller));

  return router;
}
