// View exports

export { AdminObject, type QueryParamValue, type ResponseType } from './AdminObject';
export {
  BaseView,
  HTTP_METHOD_NAMES,
  type HttpMethodName,
  type RequestHandler,
  type ViewClass,
  type ViewContext,
  type ViewType,
} from './BaseView';
export { CommView, NAV_MENU_SESSION_KEY, type CommViewContext } from './CommView';
export { Media, type MediaDefinition } from './Media';
export { ModelView, type ModelPerms } from './ModelView';
export {
  capfirst,
  checkMenuPermission,
  filterMenuForUser,
  markSelected,
  parseNavMenu,
  titleCase,
  type MenuPermission,
  type NavMenuItem,
} from './NavMenu';
