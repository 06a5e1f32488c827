import { createHashRouter } from 'react-router-dom';
import { MainPage } from '@/pages/MainPage.tsx';
import { EventPage } from '@/pages/EventPage.tsx';

// GitHub Pages has no rewrite rules, so deep links live in the hash
// (/#/events/<folder>) and every route loads the same index.html.
export const router = createHashRouter([
  {
    path: '/',
    element: <MainPage />,
  },
  {
    path: '/events/:folder',
    element: <EventPage />,
  },
]);
