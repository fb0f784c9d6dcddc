import { BrowserRouter as Router, Route, Routes, NavLink, useLocation } from 'react-router-dom';
import { useEffect } from 'react';
import { useTranslation } from 'react-i18next';
import Home from './Home';
import PageNotFound from './NotFound';
import Questionnaire from './Questionnaire';
import Report from './Report';
import Logo from './Logo';
import { AppStateProvider, useAppState } from '../context/AppStateContext';
import '../styles.css';

// Counts one visit per page view
const VisitTracker = () => {
  const location = useLocation();
  const { recordPageView } = useAppState();

  useEffect(() => {
    recordPageView();
  }, [location.pathname, recordPageView]);

  return null;
};

export const AppRoutes = () => {
  const { t } = useTranslation('common');

  return (
    <section className='app-panel panel'>
      <VisitTracker />
      <Logo />
      <nav>
        <NavLink to='/' end>{t('navigation.home')}</NavLink>
        <NavLink to='/assessment/1'>{t('navigation.assessment')}</NavLink>
        <NavLink to='/results'>{t('navigation.results')}</NavLink>
      </nav>
      <Routes>
        <Route path='/' element={<Home />} />
        <Route path='/assessment/:page' element={<Questionnaire />} />
        <Route path='/results' element={<Report />} />
        <Route path='*' element={<PageNotFound />} />
      </Routes>
    </section>
  );
};

const App = () => {
  return (
    <AppStateProvider>
      <Router>
        <AppRoutes />
      </Router>
    </AppStateProvider>
  );
};

export default App;
